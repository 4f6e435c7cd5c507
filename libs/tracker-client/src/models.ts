import { z } from 'zod';

// The API returns ids as strings for most entities and as numbers for a few.
const idSchema = z.union([z.string(), z.number()]).transform(String);

export const userSchema = z.object({
  self: z.string().nullish(),
  id: idSchema.nullish(),
  display: z.string().nullish(),
  passportUid: z.number().nullish(),
  cloudUid: z.string().nullish(),
});

/** Shape shared by status, priority, issue type, queue and parent references. */
export const keyedRefSchema = z.object({
  self: z.string().nullish(),
  id: idSchema.nullish(),
  key: z.string().nullish(),
  display: z.string().nullish(),
});

export const displayRefSchema = z.object({
  self: z.string().nullish(),
  id: idSchema.nullish(),
  display: z.string().nullish(),
});

export const projectSchema = z.object({
  primary: displayRefSchema.nullish(),
  secondary: z.array(displayRefSchema).default([]),
});

export const issueSchema = z.object({
  self: z.string().nullish(),
  id: idSchema.nullish(),
  key: z.string(),
  version: z.number().int().nullish(),
  lastCommentUpdatedAt: z.string().nullish(),
  summary: z.string(),
  parent: keyedRefSchema.nullish(),
  aliases: z.array(z.string()).default([]),
  updatedBy: userSchema.nullish(),
  description: z.string().nullish(),
  sprint: z.array(displayRefSchema).default([]),
  type: keyedRefSchema.nullish(),
  priority: keyedRefSchema.nullish(),
  createdAt: z.string().nullish(),
  followers: z.array(userSchema).default([]),
  createdBy: userSchema.nullish(),
  votes: z.number().int().default(0),
  assignee: userSchema.nullish(),
  project: projectSchema.nullish(),
  queue: keyedRefSchema.nullish(),
  updatedAt: z.string().nullish(),
  status: keyedRefSchema.nullish(),
  previousStatus: keyedRefSchema.nullish(),
  favorite: z.boolean().default(false),
  tags: z.array(z.string()).default([]),
});

export const queueSchema = z.object({
  self: z.string().nullish(),
  id: idSchema.nullish(),
  key: z.string(),
  version: z.number().int().nullish(),
  name: z.string().nullish(),
  description: z.string().nullish(),
  lead: userSchema.nullish(),
  assignAuto: z.boolean().nullish(),
  defaultType: keyedRefSchema.nullish(),
  defaultPriority: keyedRefSchema.nullish(),
});

export type User = z.infer<typeof userSchema>;
export type KeyedRef = z.infer<typeof keyedRefSchema>;
export type DisplayRef = z.infer<typeof displayRefSchema>;
export type Project = z.infer<typeof projectSchema>;
export type Issue = z.infer<typeof issueSchema>;
export type Queue = z.infer<typeof queueSchema>;

/** Extra sections the API can embed in an issue or queue response. */
export type ExpandField = 'transitions' | 'attachments' | 'comments';

export type QueueExpandField = 'projects' | 'components' | 'versions' | 'types' | 'team' | 'workflows' | 'all';

export type Language = 'ru' | 'en';

/** Reference to another entity by key, id or display value. */
export type EntityRef = string | { key: string } | { id: string };

export interface IssueCreateInput {
  queue: EntityRef;
  summary: string;
  description?: string;
  type?: EntityRef;
  priority?: EntityRef;
  assignee?: string;
  followers?: string[];
  tags?: string[];
  parent?: EntityRef;
  /** Deduplication key: a repeated create with the same value returns the existing issue. */
  unique?: string;
}

export interface QueueCreateInput {
  key: string;
  name: string;
  lead: string;
  defaultType: EntityRef;
  defaultPriority: EntityRef;
  issueTypesConfig: Array<{
    issueType: EntityRef;
    workflow: string;
    resolutions: EntityRef[];
  }>;
  description?: string;
}
