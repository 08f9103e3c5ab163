import { describe, expect, it } from 'vitest';
import { describeAccount, isSameAccount } from '../types/account.js';

describe('isSameAccount', () => {
  const alice = { serverUrl: 'https://files.example.test', username: 'alice' };

  it('matches on server and user', () => {
    expect(isSameAccount(alice, { ...alice })).toBe(true);
  });

  it('differs when either field differs', () => {
    expect(isSameAccount(alice, { ...alice, username: 'bob' })).toBe(false);
    expect(isSameAccount(alice, { ...alice, serverUrl: 'https://other.example.test' })).toBe(false);
  });

  it('describes an account as user@server', () => {
    expect(describeAccount(alice)).toBe('alice@https://files.example.test');
  });
});
