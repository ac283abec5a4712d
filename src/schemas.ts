import { z } from 'zod';
import { LogLevel } from './logging/index.js';

// ============================================
// COMMON SCHEMAS
// ============================================

const IdSchema = (what: string) => z.number().int().positive().describe(`The ID of the ${what}`);

const OffsetSchema = z
  .number()
  .int()
  .optional()
  .default(0)
  .describe('0-based item offset; must be a multiple of page_size (0, page_size, 2*page_size, ...)');

const PageSizeSchema = (fallback: number) =>
  z.number().int().optional().default(fallback).describe(`Items per page, clamped to 1..200 (default ${fallback})`);

const ProjectRefSchema = z
  .union([z.string().min(1), z.number().int().positive()])
  .describe('Project id, identifier (e.g. "website") or name (case-insensitive)');

const IsoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Use the YYYY-MM-DD format');

// name, numeric id, or null to clear
const PrincipalRefSchema = z.union([z.string().min(1), z.number().int().positive()]).nullable();

export const EmptySchema = z.object({});

// ============================================
// METADATA SCHEMAS
// ============================================

export const ResolveNameSchema = z.object({
  name: z.string().describe('Name to resolve (case-insensitive; a unique substring is enough)'),
});

export const ResolveProjectSchema = z.object({
  project: ProjectRefSchema,
});

export const ResolveUserSchema = z.object({
  user: z
    .union([z.string(), z.number().int().positive()])
    .describe('User id, display name, login or email (case-insensitive)'),
});

export const ResolveTypeForProjectSchema = z.object({
  project: ProjectRefSchema,
  type: z.string().describe('Type name valid in that project, e.g. "Task"'),
});

// ============================================
// PROJECT SCHEMAS
// ============================================

export const ListProjectsSchema = z.object({
  offset: OffsetSchema,
  page_size: PageSizeSchema(50),
  name_contains: z.string().optional().describe('Only projects whose name or identifier contains this text'),
});

// ============================================
// WORK PACKAGE SCHEMAS
// ============================================

export const GetWorkPackageSchema = z.object({
  id: IdSchema('work package'),
});

export const ListWorkPackagesSchema = z.object({
  offset: OffsetSchema,
  page_size: PageSizeSchema(50),
  project: ProjectRefSchema.optional(),
  subject_contains: z.string().optional().describe('Only work packages whose subject contains this text'),
});

export const CreateWorkPackageSchema = z.object({
  project: ProjectRefSchema,
  subject: z.string().min(1).max(255).describe('The subject (title) of the work package'),
  type: z.string().min(1).describe('Type name, e.g. "Task" or "Bug"'),
  description: z.string().optional().describe('Markdown description (optional)'),
  priority: z.string().optional().describe('Priority name, e.g. "High" (optional)'),
  status: z.string().optional().describe('Status name, e.g. "New" (optional)'),
});

export const UpdateStatusSchema = z.object({
  id: IdSchema('work package'),
  status: z.string().min(1).describe('Target status name, e.g. "In progress"'),
});

export const UpdateWorkPackageSchema = z.object({
  id: IdSchema('work package'),
  subject: z.string().min(1).max(255).optional(),
  description: z.string().optional().describe('Replaces the description (exclusive with append_description)'),
  append_description: z.string().optional().describe('Appended after a blank line (exclusive with description)'),
  start_date: IsoDateSchema.nullable().optional().describe('YYYY-MM-DD, or null to clear'),
  due_date: IsoDateSchema.nullable().optional().describe('YYYY-MM-DD, or null to clear'),
  percent_done: z.number().int().optional().describe('0..100'),
  estimated_time: z.string().optional().describe('"2h", "30m", "1.5h" or ISO 8601 like "PT2H30M"'),
  status: z.string().optional().describe('Status name'),
  priority: z.string().optional().describe('Priority name'),
  type: z.string().optional().describe("Type name; checked against the project's enabled types"),
  project: ProjectRefSchema.optional().describe('Move to this project (id, identifier or name)'),
  assignee: PrincipalRefSchema.optional().describe('User name or id; null clears the assignee'),
  accountable: PrincipalRefSchema.optional().describe('User name or id; null clears the accountable'),
  version: PrincipalRefSchema.optional().describe('Version name or id; null clears the version'),
});

export const AddCommentSchema = z.object({
  id: IdSchema('work package'),
  comment: z.string().min(1).describe('Markdown comment text'),
});

export const AppendDescriptionSchema = z.object({
  id: IdSchema('work package'),
  text: z.string().min(1).describe('Markdown appended after a blank line'),
});

export const SearchWorkPackagesSchema = z.object({
  query: z.string().min(1).describe('Text to look for in subject and description'),
});

export const ListWorkPackageVersionsSchema = z.object({
  id: IdSchema('work package'),
});

// ============================================
// TIME ENTRY SCHEMAS
// ============================================

export const LogTimeSchema = z.object({
  work_package_id: IdSchema('work package'),
  duration: z.string().describe('"2h", "30m", "2h 30m", "1.5h"'),
  comment: z.string().optional().default(''),
  activity_id: z.number().int().positive().optional().default(1).describe('Time entry activity id (default 1)'),
  spent_on: IsoDateSchema.optional().describe('YYYY-MM-DD; defaults to today'),
});

// ============================================
// USER & MEMBERSHIP SCHEMAS
// ============================================

export const GetUserSchema = z.object({
  id: IdSchema('user'),
});

export const ListUsersSchema = z.object({
  project: ProjectRefSchema.optional().describe('List members of this project instead of all users'),
  email_filter: z.string().optional().describe('Best-effort; emails may be hidden from this API key'),
  offset: OffsetSchema,
  page_size: PageSizeSchema(50),
});

export const GetProjectMembershipsSchema = z.object({
  project: ProjectRefSchema,
  offset: OffsetSchema,
  page_size: PageSizeSchema(100),
  sort: z.boolean().optional().default(false).describe('Sort by principal name'),
});

// ============================================
// QUERY SCHEMAS
// ============================================

export const ListQueriesSchema = z.object({
  project_id: z.number().int().positive().optional(),
  offset: OffsetSchema,
  page_size: PageSizeSchema(50),
});

export const RunQuerySchema = z.object({
  id: IdSchema('saved query'),
  offset: OffsetSchema,
  page_size: PageSizeSchema(50),
});

// ============================================
// ATTACHMENT SCHEMAS
// ============================================

export const AttachFileSchema = z.object({
  work_package_id: IdSchema('work package'),
  file_path: z.string().optional().describe('Path on the server running this process'),
  content_base64: z.string().optional().describe('File content, base64 (instead of file_path)'),
  file_name: z.string().optional().describe('Defaults to the file name of file_path'),
  description: z.string().optional(),
  content_type: z.string().optional().describe('MIME type; defaults to application/octet-stream'),
});

export const ListAttachmentsSchema = z.object({
  work_package_id: IdSchema('work package'),
  offset: OffsetSchema,
  page_size: PageSizeSchema(50),
});

export const DownloadAttachmentSchema = z.object({
  id: IdSchema('attachment'),
  dest_path: z.string().optional().describe('File or directory; defaults to the working directory'),
  overwrite: z.boolean().optional().default(false),
});

export const GetAttachmentContentSchema = z.object({
  id: IdSchema('attachment'),
  max_bytes: z.number().int().optional().default(1024).describe('Preview size in bytes (> 0)'),
});

// ============================================
// LOGGING SCHEMAS
// ============================================

export const SetLogLevelSchema = z.object({
  level: z
    .union([z.nativeEnum(LogLevel), z.literal('off')])
    .describe('Minimum level (debug, info, notice, warning, error, critical, alert, emergency) or off'),
  enable_mcp_logs: z.boolean().optional().describe('Send logs to the client as notifications'),
  enable_file_logs: z.boolean().optional().describe('Write logs to OPENPROJECT_LOG_FILE_PATH'),
  enable_request_logs: z.boolean().optional().describe('Log every HTTP request and response'),
  enable_metrics: z.boolean().optional().describe('Collect per-tool latency metrics'),
});
