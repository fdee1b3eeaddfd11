import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  ListResourcesRequestSchema,
  ReadResourceRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import type { ServerConfig } from './config.js';
import { MONTH_BEFORE_DAY } from './parser/day-composer.js';
import { MCP_SERVER_NAME, MCP_SERVER_VERSION } from './server-metadata.js';
import { registerTools } from './tools/registry.js';
import type { Logger } from './utils/logger.js';

export const METADATA_RESOURCE_URI = `${MCP_SERVER_NAME}://metadata`;

export function createServer(config: ServerConfig, logger: Logger): Server {
  const server = new Server(
    { name: MCP_SERVER_NAME, version: MCP_SERVER_VERSION },
    {
      capabilities: {
        tools: {},
        resources: {},
      },
    },
  );

  registerTools(server, config, logger);

  server.setRequestHandler(ListResourcesRequestSchema, async () => ({
    resources: [
      {
        uri: METADATA_RESOURCE_URI,
        name: 'Date Parser Metadata',
        description: 'Server version, accepted date formats and parsing policies.',
        mimeType: 'application/json',
      },
    ],
  }));

  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    const { uri } = request.params;

    if (uri === METADATA_RESOURCE_URI) {
      const metadata = {
        name: MCP_SERVER_NAME,
        version: MCP_SERVER_VERSION,
        formats: {
          iso: '[+-yy]yyyy-MM-DD[THH:mm[:ss[.sss]][Z|+-hh:mm|+-hhmm]]',
          lenient: ['Jan 5 2020', '5 January 2020 3:15 PM', '03/04/2020 12:00 EST', 'Tue, 01 Mar 2011 12:00:00 GMT+0100 (CET)'],
        },
        policies: {
          ambiguous_numeric_order: MONTH_BEFORE_DAY ? 'month before day' : 'day before month',
          two_digit_years: '00-49 -> 2000-2049, 50-99 -> 1950-1999',
          date_only_as_utc: config.dateOnlyAsUtc,
        },
      };

      return {
        contents: [
          {
            uri,
            mimeType: 'application/json',
            text: JSON.stringify(metadata, null, 2),
          },
        ],
      };
    }

    throw new Error(`Unknown resource: ${uri}`);
  });

  return server;
}
