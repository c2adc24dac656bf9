/**
 * Blog Service
 * Post creation and listing of published posts
 */

import type { Result } from '../errors.js';
import type { BlogCreatePayload, BlogPost } from '../schemas/index.js';
import type { DocumentStore } from '../storage/document-store.js';
import type { CollectionName, PublicDocument, StoredDocument } from '../types/index.js';
import { withStore } from './store-access.js';

export const BLOG_COLLECTION: CollectionName = 'blogpost';

export const DEFAULT_LIST_LIMIT = 10;

export class BlogService {
  constructor(private readonly store: DocumentStore | null) {}

  create(payload: BlogCreatePayload): Result<string> {
    const post: BlogPost = {
      title: payload.title,
      slug: payload.slug,
      content: payload.content,
      excerpt: payload.excerpt,
      author: payload.author,
      tags: payload.tags,
      published: payload.published,
    };
    return withStore(this.store, store => store.createDocument(BLOG_COLLECTION, post));
  }

  /**
   * Published posts in creation order, at most `limit` of them
   */
  listPublished(limit = DEFAULT_LIST_LIMIT): Result<PublicDocument[]> {
    return withStore(this.store, store =>
      store.getDocuments(BLOG_COLLECTION, { published: true }, limit).map(toPublicDocument)
    );
  }
}

export function toPublicDocument({ _id, ...fields }: StoredDocument): PublicDocument {
  return { ...fields, id: _id };
}
