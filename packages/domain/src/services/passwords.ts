import fs from 'node:fs';

import bcrypt from 'bcryptjs';

export const MIN_PASSWORD_LENGTH = 8;
export const DEFAULT_PASSWORD_HASH_ROUNDS = 12;

const MIN_SIMILARITY_LENGTH = 3;

let commonPasswords: ReadonlySet<string> | undefined;

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((entry) => typeof entry === 'string');

const loadCommonPasswords = (): ReadonlySet<string> => {
  if (commonPasswords) {
    return commonPasswords;
  }

  const raw: unknown = JSON.parse(
    fs.readFileSync(new URL('../data/common-passwords.json', import.meta.url), 'utf8'),
  );
  if (!isStringArray(raw)) {
    throw new Error('common-passwords.json must contain an array of strings');
  }

  commonPasswords = new Set(raw.map((entry) => entry.toLowerCase()));
  return commonPasswords;
};

export interface PasswordUserAttributes {
  email?: string;
  firstName?: string;
  lastName?: string;
}

/**
 * Returns every strength rule the password breaks, in a stable order.
 * An empty list means the password is acceptable.
 */
export const checkPasswordStrength = (
  password: string,
  attributes: PasswordUserAttributes = {},
): string[] => {
  const problems: string[] = [];
  const lowered = password.toLowerCase();

  const similarTo: Array<[label: string, value: string | undefined]> = [
    ['email', attributes.email?.split('@')[0]],
    ['first name', attributes.firstName],
    ['last name', attributes.lastName],
  ];
  for (const [label, value] of similarTo) {
    const needle = value?.trim().toLowerCase();
    if (needle && needle.length >= MIN_SIMILARITY_LENGTH && lowered.includes(needle)) {
      problems.push(`The password is too similar to the ${label}.`);
      break;
    }
  }

  if (password.length < MIN_PASSWORD_LENGTH) {
    problems.push(
      `This password is too short. It must contain at least ${MIN_PASSWORD_LENGTH} characters.`,
    );
  }
  if (loadCommonPasswords().has(lowered.trim())) {
    problems.push('This password is too common.');
  }
  if (/^\d+$/.test(password)) {
    problems.push('This password is entirely numeric.');
  }

  return problems;
};

export const hashPassword = (password: string, rounds = DEFAULT_PASSWORD_HASH_ROUNDS) =>
  bcrypt.hash(password, rounds);

export const comparePassword = (candidate: string, passwordHash: string): Promise<boolean> =>
  bcrypt.compare(candidate, passwordHash);
