/**
 * Tool registry for the date string MCP server.
 * Shared between the stdio entry point (index.ts) and the tests.
 *
 * This is the single source of truth for tool definitions.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  Tool,
} from '@modelcontextprotocol/sdk/types.js';

import type { ServerConfig } from '../config.js';
import type { Logger } from '../utils/logger.js';
import { parseDateTool } from './parse-date.js';
import { normalizeDateTool } from './normalize-date.js';
import { listKeywords } from './list-keywords.js';
import { ListKeywordsSchema, NormalizeDateSchema, ParseDateSchema } from './schemas.js';

export const TOOLS: Tool[] = [
  {
    name: 'parse_date',
    description:
      'Parse a free-form date string into year, month (0-based), day, hour, minute, second, millisecond and UTC offset in seconds. Accepts ISO strings ("2020-01-05T10:30:00+01:00"), US-style numbers ("03/04/2020"), month names ("5 Jan 2020", "January 5, 2020 3:15 PM") and RFC-style strings ("Tue, 01 Mar 2011 12:00:00 GMT+0100"). Returns valid=false when the string is not a date.',
    inputSchema: {
      type: 'object',
      properties: {
        date: { type: 'string', description: 'Date string to parse' },
        date_only_as_utc: {
          type: 'boolean',
          description: 'Give ISO date-only strings ("2020-01-05") a UTC offset of 0 instead of none (server default applies when omitted)',
        },
      },
      required: ['date'],
    },
  },
  {
    name: 'normalize_date',
    description:
      'Rewrite a free-form date string in the canonical form YYYY-MM-DDThh:mm:ss.mmm±hh:mm (offset omitted when the input has no timezone). Returns normalized=null when the string is not a date.',
    inputSchema: {
      type: 'object',
      properties: {
        date: { type: 'string', description: 'Date string to normalize' },
        date_only_as_utc: { type: 'boolean', description: 'Treat ISO date-only strings as UTC' },
      },
      required: ['date'],
    },
  },
  {
    name: 'list_keywords',
    description:
      'List the words the parser recognizes: month names, AM/PM, the ISO time separator "T" and timezone abbreviations with their offsets in minutes. Words are matched on their first three letters.',
    inputSchema: {
      type: 'object',
      properties: {
        type: {
          type: 'string',
          description: 'Only list keywords of this type',
          enum: ['MonthName', 'TimeZoneName', 'TimeSeparator', 'AmPm'],
        },
      },
      required: [],
    },
  },
];

export function registerTools(server: Server, config: ServerConfig, logger: Logger): void {
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: TOOLS };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    logger.debug(`Calling ${name}`, args ?? {});

    try {
      let result: unknown;

      switch (name) {
        case 'parse_date':
          result = await parseDateTool(ParseDateSchema.parse(args ?? {}), config);
          break;
        case 'normalize_date':
          result = await normalizeDateTool(NormalizeDateSchema.parse(args ?? {}), config);
          break;
        case 'list_keywords':
          result = await listKeywords(ListKeywordsSchema.parse(args ?? {}));
          break;
        default:
          return {
            content: [{ type: 'text', text: `Error: Unknown tool "${name}".` }],
            isError: true,
          };
      }

      return {
        content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`Tool ${name} failed: ${message}`);
      return {
        content: [{ type: 'text', text: `Error executing ${name}: ${message}` }],
        isError: true,
      };
    }
  });
}
