import {
  DuplicateEmailError,
  DuplicateKeyError,
  InvalidCredentialsError,
  NotFoundError,
  PersistenceError,
  WriteFailureError,
} from '../errors.js';
import { demoToken, hashPassword, verifyPassword } from '../auth/password.js';
import type { DocumentStore } from '../store/documentStore.js';
import type { StoredRecord } from '../store/registry.js';
import {
  loginSchema,
  normalizeEmail,
  profileUpdateSchema,
  registerSchema,
  type UserRecord,
} from '../validation/schemas.js';
import { validate } from '../validation/validate.js';

export type UserProfile = {
  name: string;
  email: string;
  major: string | null;
  year: string | null;
  avatar: string | null;
};

export type UserView = UserProfile & { id: string };

export type LoginResult = {
  token: string;
  profile: UserProfile;
};

function toProfile(user: StoredRecord<'user'>): UserProfile {
  return {
    name: user.name,
    email: user.email,
    major: user.major,
    year: user.year,
    avatar: user.avatar,
  };
}

export async function registerUser(store: DocumentStore, input: unknown): Promise<string> {
  const payload = validate(registerSchema, input);

  const user: UserRecord = {
    name: payload.name,
    email: payload.email,
    password_hash: hashPassword(payload.password),
    major: payload.major ?? null,
    year: payload.year ?? null,
    avatar: null,
  };

  // Email uniqueness is enforced by the unique index on user.email.
  try {
    return await store.createDocument('user', user);
  } catch (err) {
    if (err instanceof DuplicateKeyError) {
      throw new DuplicateEmailError();
    }
    if (err instanceof WriteFailureError) {
      throw new PersistenceError(err.message, err);
    }
    throw err;
  }
}

export async function loginUser(store: DocumentStore, input: unknown): Promise<LoginResult> {
  const { email, password } = validate(loginSchema, input);

  const user = await store.findOne('user', { email });
  if (!user || !verifyPassword(password, user.password_hash)) {
    throw new InvalidCredentialsError();
  }

  return { token: demoToken(email), profile: toProfile(user) };
}

/**
 * Merges the provided non-null profile fields into the user stored under `email`.
 * The update runs first; a missing user is only detected on the read-back.
 */
export async function updateProfile(store: DocumentStore, email: string, input: unknown): Promise<UserView> {
  const payload = validate(profileUpdateSchema, input);
  const owner = normalizeEmail(email);

  const fields: Partial<UserRecord> = {};
  if (payload.name != null) fields.name = payload.name;
  if (payload.major != null) fields.major = payload.major;
  if (payload.year != null) fields.year = payload.year;
  if (payload.avatar != null) fields.avatar = payload.avatar;

  if (Object.keys(fields).length > 0) {
    await store.updateOne('user', { email: owner }, fields);
  }

  const user = await store.findOne('user', { email: owner });
  if (!user) {
    throw new NotFoundError('USER_NOT_FOUND', 'User not found');
  }
  return { id: user.id, ...toProfile(user) };
}
