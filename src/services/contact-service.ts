/**
 * Contact form submissions. Write-only.
 */

import type { Result } from '../errors.js';
import type { ContactMessage, ContactPayload } from '../schemas/index.js';
import type { DocumentStore } from '../storage/document-store.js';
import type { CollectionName } from '../types/index.js';
import { withStore } from './store-access.js';

export const CONTACT_COLLECTION: CollectionName = 'contactmessage';

export class ContactService {
  constructor(private readonly store: DocumentStore | null) {}

  submit(payload: ContactPayload): Result<string> {
    const message: ContactMessage = {
      name: payload.name,
      email: payload.email,
      message: payload.message,
    };
    return withStore(this.store, store => store.createDocument(CONTACT_COLLECTION, message));
  }
}
