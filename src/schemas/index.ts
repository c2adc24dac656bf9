/**
 * Request payload and stored record schemas.
 * Types are derived with z.infer so the shapes are declared once.
 */

import { z } from 'zod';
import { err, ok, ValidationError, type Result } from '../errors.js';

// ============================================
// Stored Records
// ============================================

export const UserSchema = z.object({
  name: z.string(),
  email: z.string(),
  /** SHA-256 hex digest of the password */
  password_hash: z.string(),
});

export const BlogPostSchema = z.object({
  title: z.string(),
  slug: z.string(),
  content: z.string(),
  excerpt: z.string().nullable().default(null),
  author: z.string(),
  tags: z.array(z.string()).default([]),
  published: z.boolean().default(true),
});

export const ContactMessageSchema = z.object({
  name: z.string(),
  email: z.string(),
  message: z.string(),
});

export type User = z.infer<typeof UserSchema>;
export type BlogPost = z.infer<typeof BlogPostSchema>;
export type ContactMessage = z.infer<typeof ContactMessageSchema>;

// ============================================
// Request Payloads
// ============================================

export const SignupPayloadSchema = z.object({
  name: z.string(),
  email: z.string(),
  password: z.string(),
});

export const LoginPayloadSchema = z.object({
  email: z.string(),
  password: z.string(),
});

export const BlogCreatePayloadSchema = BlogPostSchema;

export const ContactPayloadSchema = ContactMessageSchema;

export const BlogListQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(Number.MAX_SAFE_INTEGER).default(10),
});

export type SignupPayload = z.infer<typeof SignupPayloadSchema>;
export type LoginPayload = z.infer<typeof LoginPayloadSchema>;
export type BlogCreatePayload = z.infer<typeof BlogCreatePayloadSchema>;
export type ContactPayload = z.infer<typeof ContactPayloadSchema>;
export type BlogListQuery = z.infer<typeof BlogListQuerySchema>;

/**
 * Validate untrusted input against a schema
 */
export function parseWith<S extends z.ZodTypeAny>(schema: S, input: unknown): Result<z.output<S>, ValidationError> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    return err(ValidationError.fromZod(parsed.error));
  }
  return ok(parsed.data);
}
