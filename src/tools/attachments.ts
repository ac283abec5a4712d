import { mkdir, stat } from 'node:fs/promises';
import { basename, dirname, join, resolve } from 'node:path';
import { OpenProjectClientError, OpenProjectErrorType, ValidationError } from '../errors.js';
import { HalPayload, embeddedElements, getLinkHref, getLinkTitle, parseIdFromHref, readInteger, readString } from '../hal.js';
import { Page } from '../models.js';
import {
  AttachFileSchema,
  DownloadAttachmentSchema,
  GetAttachmentContentSchema,
  ListAttachmentsSchema,
} from '../schemas.js';
import { pageParams, pageWindow, readTotal, toPage } from '../utils.js';
import { CREATE, LOCAL, READ_ONLY, RegisteredTool, ToolContext, defineTool } from './registry.js';

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

export interface AttachmentSummary {
  id: number | null;
  file_name: string | null;
  file_size: number | null;
  download_href: string | null;
}

export function toAttachmentSummary(payload: HalPayload): AttachmentSummary {
  return {
    id: readInteger(payload, 'id') ?? parseIdFromHref(getLinkHref(payload, 'self')),
    file_name: readString(payload, 'fileName') ?? getLinkTitle(payload, 'self'),
    file_size: readInteger(payload, 'fileSize'),
    download_href: getLinkHref(payload, 'downloadLocation'),
  };
}

function decodeBase64(value: string): Buffer {
  const compact = value.replace(/\s+/g, '');
  if (compact.length % 4 !== 0 || !BASE64.test(compact)) {
    throw new ValidationError('Invalid base64 content.');
  }
  return Buffer.from(compact, 'base64');
}

// ============================================
// UPLOAD
// ============================================

export interface AttachFileInput {
  work_package_id: number;
  file_path?: string;
  content_base64?: string;
  file_name?: string;
  description?: string;
  content_type?: string;
}

export async function attachFile(ctx: ToolContext, input: AttachFileInput): Promise<AttachmentSummary> {
  const content = input.content_base64 !== undefined ? decodeBase64(input.content_base64) : undefined;
  if (content === undefined && !input.file_path) {
    throw new ValidationError('Either file_path or content_base64 must be provided.');
  }

  const created = await ctx.client.postFile(
    `/api/v3/work_packages/${input.work_package_id}/attachments`,
    {
      filePath: input.file_path,
      content,
      fileName: input.file_name,
      contentType: input.content_type,
      metadata: input.description ? { description: input.description } : {},
    },
    { tool: 'attach_file', signal: ctx.signal }
  );
  return toAttachmentSummary(created);
}

// ============================================
// LIST & DOWNLOAD
// ============================================

export async function listAttachments(
  ctx: ToolContext,
  args: { work_package_id: number; offset?: number; page_size?: number }
): Promise<Page<AttachmentSummary>> {
  const window = pageWindow(args.offset, args.page_size);
  const payload = await ctx.client.get(`/api/v3/work_packages/${args.work_package_id}/attachments`, {
    params: pageParams(window),
    tool: 'list_attachments',
    signal: ctx.signal,
  });
  return toPage(embeddedElements(payload).map(toAttachmentSummary), window, readTotal(payload));
}

async function attachmentLocation(ctx: ToolContext, id: number, tool: string): Promise<{ href: string; fileName: string | null }> {
  const payload = await ctx.client.get(`/api/v3/attachments/${id}`, { tool, signal: ctx.signal });
  const href = getLinkHref(payload, 'downloadLocation');
  if (!href) {
    throw new OpenProjectClientError(OpenProjectErrorType.PARSE_ERROR, 'Attachment downloadLocation missing.', {
      attachment_id: id,
    });
  }
  return { href, fileName: readString(payload, 'fileName') };
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return false;
    throw error;
  }
}

/** Server-supplied names are reduced to their last path segment. */
function localFileName(fileName: string | null, id: number): string {
  if (fileName === null) return `attachment-${id}`;
  const name = basename(fileName.replace(/\\/g, '/'));
  if (!name || name === '.' || name === '..') {
    throw new ValidationError('Attachment file name cannot be used locally; pass dest_path with a file name.', {
      attachment_id: id,
      file_name: fileName,
    });
  }
  return name;
}

/** Saves on the machine running this server; returns the absolute path written. */
export async function downloadAttachment(
  ctx: ToolContext,
  args: { id: number; dest_path?: string; overwrite?: boolean }
): Promise<{ path: string; bytes: number; content_type: string | null }> {
  const { href, fileName } = await attachmentLocation(ctx, args.id, 'download_attachment');

  let dest = args.dest_path ?? '.';
  if (await isDirectory(dest)) {
    dest = join(dest, localFileName(fileName, args.id));
  }
  dest = resolve(dest);
  await mkdir(dirname(dest), { recursive: true });

  const result = await ctx.client.downloadToFile(href, dest, {
    overwrite: args.overwrite ?? false,
    tool: 'download_attachment',
    signal: ctx.signal,
  });
  return { path: result.path, bytes: result.bytes, content_type: result.contentType };
}

export async function getAttachmentContent(
  ctx: ToolContext,
  args: { id: number; max_bytes?: number }
): Promise<{ bytes: string; size: number; content_type: string | null }> {
  const maxBytes = args.max_bytes ?? 1024;
  if (maxBytes <= 0) {
    throw new ValidationError('max_bytes must be > 0', { max_bytes: maxBytes });
  }

  const { href } = await attachmentLocation(ctx, args.id, 'get_attachment_content');
  const { data, contentType } = await ctx.client.getBytes(href, {
    maxBytes,
    tool: 'get_attachment_content',
    signal: ctx.signal,
  });
  return { bytes: data.toString('base64'), size: data.length, content_type: contentType };
}

// ============================================
// TOOLS
// ============================================

export const attachmentTools: RegisteredTool[] = [
  defineTool({
    name: 'attach_file',
    title: 'Attach File',
    description: `Upload a file as an attachment to a work package.

PARAMETERS:
- work_package_id (required)
- file_path: a file on the machine running this server, OR content_base64: the bytes themselves.
- file_name (optional): defaults to the file name of file_path, else attachment.bin.
- description, content_type (optional).

The upload is sent once and never retried, so a failed call does not leave duplicates.
RETURNS: { id, file_name, file_size, download_href }`,
    schema: AttachFileSchema,
    annotations: CREATE,
    handler: async (args, ctx) => attachFile(ctx, args),
  }),

  defineTool({
    name: 'list_attachments',
    title: 'List Attachments',
    description: 'List the attachments of a work package. RETURNS: { items: [{ id, file_name, file_size, download_href }], offset, page_size, total, next_offset }',
    schema: ListAttachmentsSchema,
    annotations: READ_ONLY,
    handler: async (args, ctx) => listAttachments(ctx, args),
  }),

  defineTool({
    name: 'download_attachment',
    title: 'Download Attachment',
    description: `Save an attachment to disk on the machine running this server.

dest_path may be a file or an existing directory (the attachment's file name is used); default is the working directory. An existing file is only replaced with overwrite: true.
RETURNS: { path (absolute), bytes, content_type }`,
    schema: DownloadAttachmentSchema,
    annotations: LOCAL,
    handler: async (args, ctx) => downloadAttachment(ctx, args),
  }),

  defineTool({
    name: 'get_attachment_content',
    title: 'Preview Attachment',
    description: 'Fetch the first max_bytes (default 1024) of an attachment. RETURNS: { bytes (base64), size, content_type }',
    schema: GetAttachmentContentSchema,
    annotations: READ_ONLY,
    handler: async (args, ctx) => getAttachmentContent(ctx, args),
  }),
];
