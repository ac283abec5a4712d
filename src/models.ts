import { z } from 'zod';

// ============================================
// REFERENCE ITEMS
// ============================================

export const ReferenceItemSchema = z.object({
  id: z.number().int(),
  name: z.string(),
});

export const TypeRefSchema = ReferenceItemSchema;

export const PriorityRefSchema = ReferenceItemSchema;

export const StatusRefSchema = ReferenceItemSchema.extend({
  isClosed: z.boolean().optional().default(false),
});

export const ProjectRefSchema = ReferenceItemSchema.extend({
  identifier: z.string().optional().default(''),
});

export const UserRefSchema = ReferenceItemSchema.extend({
  login: z.string().nullish(),
  mail: z.string().nullish(),
  // current API versions call it email
  email: z.string().nullish(),
});

export const VersionRefSchema = ReferenceItemSchema;

export type ReferenceItem = z.infer<typeof ReferenceItemSchema>;
export type TypeRef = z.infer<typeof TypeRefSchema>;
export type PriorityRef = z.infer<typeof PriorityRefSchema>;
export type StatusRef = z.infer<typeof StatusRefSchema>;
export type ProjectRef = z.infer<typeof ProjectRefSchema>;
export type UserRef = z.infer<typeof UserRefSchema>;
export type VersionRef = z.infer<typeof VersionRefSchema>;

// ============================================
// TOOL RESULT SHAPES
// ============================================

export interface NamedRef {
  id: number | null;
  name: string | null;
}

export interface WorkPackageSummary {
  id: number | null;
  subject: string | null;
  lock_version: number | null;
  description: string;
  status: NamedRef;
  priority: NamedRef;
  project: NamedRef;
  type: NamedRef;
  assignee: NamedRef | null;
  url: string | null;
}

export interface Page<T> {
  items: T[];
  offset: number;
  page_size: number;
  total: number | null;
  next_offset: number | null;
}
