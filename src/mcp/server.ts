import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import * as z from 'zod/v4';
import type { Logger } from 'pino';

import { TOOL_NAMES, type ToolDispatcher, type ToolResult } from '../tools/dispatcher.js';

export interface ServerDependencies {
  logger: Logger;
  dispatcher: ToolDispatcher;
}

export const SERVER_INSTRUCTIONS =
  'This server reads and sets inverter power limits through an OpenDTU appliance. ' +
  'Writing a limit requires authentication on the appliance. Always prefer temporary limits ' +
  '(limit_type 0 or 1) to spare the inverter EEPROM; persistent limits (256, 257) should be used sparingly.';

function toJsonText(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

export function toToolResponse(result: ToolResult) {
  const structuredContent: Record<string, unknown> = { ...result };
  const content = [
    {
      type: 'text' as const,
      text: toJsonText(result)
    }
  ];

  if (!result.ok) {
    return {
      isError: true,
      content,
      structuredContent
    };
  }

  return {
    content,
    structuredContent
  };
}

export function buildMcpServer(deps: ServerDependencies): McpServer {
  const { dispatcher, logger } = deps;

  const server = new McpServer(
    {
      name: 'mcp-opendtu',
      version: '1.0.0',
      websiteUrl: 'https://www.opendtu.solar/'
    },
    {
      capabilities: {
        logging: {}
      },
      instructions: SERVER_INSTRUCTIONS
    }
  );

  server.registerTool(
    TOOL_NAMES.getInverters,
    {
      title: 'List inverters',
      description:
        'List all inverters configured in OpenDTU with live data: serial, name, current AC power (W), ' +
        'reachability, production state and the current limit, plus plant totals.',
      annotations: {
        readOnlyHint: true,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: false
      }
    },
    async () => toToolResponse(await dispatcher.dispatch(TOOL_NAMES.getInverters))
  );

  server.registerTool(
    TOOL_NAMES.getLimitStatus,
    {
      title: 'Get limit status',
      description:
        'Read the current power limit of all inverters, or of one inverter when serial is given: ' +
        'relative limit (%), maximum power (W), computed absolute limit (W) and the status of the last limit change. ' +
        'An unknown serial returns an empty result.',
      inputSchema: {
        serial: z.string().optional().describe("Inverter serial number (e.g. '114181800001'). Omit for all inverters.")
      },
      annotations: {
        readOnlyHint: true,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: false
      }
    },
    async (args) => toToolResponse(await dispatcher.dispatch(TOOL_NAMES.getLimitStatus, args))
  );

  server.registerTool(
    TOOL_NAMES.setLimit,
    {
      title: 'Set inverter limit',
      description:
        'Set the power limit of one inverter. limit_type: 0 = absolute temporary (W), ' +
        '1 = relative temporary (%, default), 256 = absolute persistent (W, writes EEPROM), ' +
        '257 = relative persistent (%, writes EEPROM). Relative values take 0-100. ' +
        'The change is pending for a few seconds; confirm it with opendtu_get_limit_status.',
      inputSchema: {
        serial: z.string().describe("Inverter serial number (e.g. '114181800001')."),
        value: z.number().describe('Limit value: watts for absolute limits, percent (0-100) for relative limits.'),
        limit_type: z
          .number()
          .int()
          .optional()
          .describe('0, 1, 256 or 257. Defaults to 1 (relative, temporary).')
      },
      annotations: {
        readOnlyHint: false,
        destructiveHint: false,
        idempotentHint: false,
        openWorldHint: false
      }
    },
    async (args) => {
      logger.debug({ tool: TOOL_NAMES.setLimit, ...args }, 'Tool call received');
      return toToolResponse(await dispatcher.dispatch(TOOL_NAMES.setLimit, args));
    }
  );

  return server;
}
