import { parseDuration } from '../duration.js';
import { getLinkHref, parseIdFromHref, readInteger } from '../hal.js';
import { LogTimeSchema } from '../schemas.js';
import { today } from '../utils.js';
import { CREATE, RegisteredTool, ToolContext, defineTool } from './registry.js';

export interface LogTimeInput {
  work_package_id: number;
  duration: string;
  comment?: string;
  activity_id?: number;
  spent_on?: string;
}

export interface LogTimeResult {
  message: string;
  time_entry_id: number | null;
  hours: string;
  spent_on: string;
}

export async function logTime(ctx: ToolContext, input: LogTimeInput): Promise<LogTimeResult> {
  // parsed first so a bad duration never reaches the API
  const { iso } = parseDuration(input.duration);
  const spentOn = input.spent_on ?? today();

  const created = await ctx.client.post(
    '/api/v3/time_entries',
    {
      hours: iso,
      comment: { raw: input.comment ?? '' },
      spentOn,
      _links: {
        entity: { href: `/api/v3/work_packages/${input.work_package_id}` },
        activity: { href: `/api/v3/time_entries/activities/${input.activity_id ?? 1}` },
      },
    },
    { tool: 'log_time', signal: ctx.signal }
  );

  return {
    message: `Logged ${input.duration} to work package ${input.work_package_id} on ${spentOn}.`,
    time_entry_id: readInteger(created, 'id') ?? parseIdFromHref(getLinkHref(created, 'self')),
    hours: iso,
    spent_on: spentOn,
  };
}

export const timeEntryTools: RegisteredTool[] = [
  defineTool({
    name: 'log_time',
    title: 'Log Time',
    description: `Log time spent on a work package.

PARAMETERS:
- work_package_id (required)
- duration (required): hours and minutes, e.g. "2h", "30m", "2h 30m", "1.5h". Rounded to the minute.
- comment (optional)
- activity_id (optional): time entry activity, default 1
- spent_on (optional): YYYY-MM-DD, default today (server local date)

RETURNS: { message, time_entry_id, hours (ISO 8601), spent_on }`,
    schema: LogTimeSchema,
    annotations: CREATE,
    handler: async (args, ctx) => logTime(ctx, args),
  }),
];
