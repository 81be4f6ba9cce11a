/**
 * How a user is presented to the support side: topic titles and the header
 * line posted above relayed messages.
 */

export interface UserProfile {
  id: number;
  firstName: string;
  lastName?: string;
  username?: string;
}

export function escapeHtml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

function fullName(user: UserProfile): string {
  return [user.firstName, user.lastName].filter(Boolean).join(" ").trim();
}

/** Short name for topic titles: full name, else @username, else id. */
export function displayName(user: UserProfile): string {
  const name = fullName(user);
  if (name) return name;
  if (user.username) return `@${user.username}`;
  return `id:${user.id}`;
}

/** "Full Name | @username | id:42", with the parts that exist. Plain text. */
export function formatUserHeader(user: UserProfile): string {
  const parts: string[] = [];
  const name = fullName(user);
  if (name) parts.push(name);
  if (user.username) parts.push(`@${user.username}`);
  parts.push(`id:${user.id}`);
  return parts.join(" | ");
}
