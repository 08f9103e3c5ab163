/**
 * Account Types
 */

/**
 * Identity of the session that owns a cached file
 */
export interface Account {
  serverUrl: string;
  username: string;
}

export function isSameAccount(a: Account, b: Account): boolean {
  return a.serverUrl === b.serverUrl && a.username === b.username;
}

/**
 * Short label used in logs
 */
export function describeAccount(account: Account): string {
  return `${account.username}@${account.serverUrl}`;
}
