/**
 * Auth Service
 * Account signup and password login against the `user` collection
 */

import { createHash, timingSafeEqual } from 'crypto';
import { err, ok, UnauthorizedError, type Result } from '../errors.js';
import type { SignupPayload, LoginPayload, User } from '../schemas/index.js';
import type { DocumentStore } from '../storage/document-store.js';
import type { CollectionName } from '../types/index.js';
import { withStore } from './store-access.js';

export const USER_COLLECTION: CollectionName = 'user';

/**
 * SHA-256 hex digest of a password. Unsalted, so equal passwords share a digest.
 */
export function hashPassword(password: string): string {
  return createHash('sha256').update(password, 'utf8').digest('hex');
}

function digestsMatch(expected: string, actual: string): boolean {
  const a = Buffer.from(expected, 'utf8');
  const b = Buffer.from(actual, 'utf8');
  return a.length === b.length && timingSafeEqual(a, b);
}

export class AuthService {
  constructor(private readonly store: DocumentStore | null) {}

  /**
   * Store a new user and return its id. Duplicate emails are not rejected.
   */
  signup(payload: SignupPayload): Result<string> {
    const user: User = {
      name: payload.name,
      email: payload.email,
      password_hash: hashPassword(payload.password),
    };
    return withStore(this.store, store => store.createDocument(USER_COLLECTION, user));
  }

  /**
   * Unknown email and wrong password fail with the same error
   */
  login(payload: LoginPayload): Result<void> {
    const found = withStore(this.store, store =>
      store.getDocuments(USER_COLLECTION, { email: payload.email }, 1)
    );
    if (!found.ok) {
      return found;
    }

    const [user] = found.value;
    const storedHash = user?.password_hash;
    if (typeof storedHash !== 'string' || !digestsMatch(storedHash, hashPassword(payload.password))) {
      return err(new UnauthorizedError());
    }

    return ok(undefined);
  }
}
