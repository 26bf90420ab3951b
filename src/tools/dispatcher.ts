import type { Logger } from 'pino';

import type { AppConfig } from '../config.js';
import {
  actionableErrorFields,
  asOpenDtuError,
  OpenDtuError,
  validationError,
  type ErrorKind,
  type ValidationReason
} from '../errors.js';
import type { AuditStore } from '../audit/auditStore.js';
import { SerialLock } from '../concurrency/serialLock.js';
import {
  DEFAULT_LIMIT_TYPE,
  describeLimitType,
  isRelativeLimit,
  validateLimitCommand,
  type LimitCommand,
  type LimitType
} from '../limit/limitSpec.js';
import type { OpenDtuClient } from '../opendtu/client.js';
import type { LimitStatusMap, LiveDataSummary } from '../opendtu/normalizer.js';

export const TOOL_NAMES = {
  getInverters: 'opendtu_get_inverters',
  getLimitStatus: 'opendtu_get_limit_status',
  setLimit: 'opendtu_set_limit'
} as const;

export type ToolName = (typeof TOOL_NAMES)[keyof typeof TOOL_NAMES];

export interface ToolErrorPayload {
  kind: ErrorKind;
  message: string;
  reason?: ValidationReason;
  statusCode?: number;
  retryable: boolean;
  fixHint: string;
  details?: Record<string, unknown>;
}

export type ToolResult<T = unknown> =
  | { ok: true; data: T; meta?: Record<string, unknown> }
  | { ok: false; error: ToolErrorPayload };

export interface SetLimitArgs {
  serial: string;
  value: number;
  limitType?: number;
}

export interface AppliedLimit {
  serial: string;
  applied: number;
  type: LimitType;
}

export interface ToolDispatcherDependencies {
  config: Pick<AppConfig, 'enforceMaxPower' | 'persistentWriteWindowSec' | 'persistentWriteAdvisoryThreshold'>;
  logger: Logger;
  client: Pick<OpenDtuClient, 'getLiveData' | 'getLimitStatus' | 'setLimit'>;
  audit: AuditStore;
  lock?: SerialLock;
}

export function toErrorPayload(error: OpenDtuError): ToolErrorPayload {
  return {
    kind: error.kind,
    message: error.message,
    ...(error.reason ? { reason: error.reason } : {}),
    ...(error.statusCode === undefined ? {} : { statusCode: error.statusCode }),
    ...actionableErrorFields(error.kind),
    ...(error.fixHint ? { fixHint: error.fixHint } : {}),
    ...(error.details ? { details: error.details } : {})
  };
}

function readOptionalString(args: Record<string, unknown>, key: string): string | undefined {
  const value = args[key];
  return typeof value === 'string' ? value : undefined;
}

function readOptionalNumber(args: Record<string, unknown>, key: string): number | undefined {
  const value = args[key];
  return typeof value === 'number' ? value : undefined;
}

export class ToolDispatcher {
  private readonly lock: SerialLock;

  constructor(private readonly deps: ToolDispatcherDependencies) {
    this.lock = deps.lock ?? new SerialLock();
  }

  async dispatch(name: string, args: Record<string, unknown> = {}): Promise<ToolResult> {
    switch (name) {
      case TOOL_NAMES.getInverters:
        return this.getInverters();
      case TOOL_NAMES.getLimitStatus: {
        if (args.serial !== undefined && typeof args.serial !== 'string') {
          return this.reject(name, validationError('InvalidArgument', 'serial must be a string when provided.'));
        }
        return this.getLimitStatus(readOptionalString(args, 'serial'));
      }
      case TOOL_NAMES.setLimit: {
        const serial = readOptionalString(args, 'serial');
        const value = readOptionalNumber(args, 'value');
        if (serial === undefined || value === undefined) {
          return this.reject(
            name,
            validationError('InvalidArgument', 'opendtu_set_limit requires a string serial and a numeric value.')
          );
        }
        if (args.limit_type !== undefined && typeof args.limit_type !== 'number') {
          return this.reject(name, validationError('InvalidArgument', 'limit_type must be a number when provided.'));
        }
        return this.setLimit({ serial, value, limitType: readOptionalNumber(args, 'limit_type') });
      }
      default:
        return this.reject(name, validationError('UnknownTool', `Unknown tool '${name}'.`));
    }
  }

  async getInverters(): Promise<ToolResult<LiveDataSummary>> {
    const tool = TOOL_NAMES.getInverters;
    const started = Date.now();
    try {
      const data = await this.deps.client.getLiveData();
      this.deps.audit.record({ tool, result: 'success', durationMs: Date.now() - started });
      this.deps.logger.debug({ tool, inverters: data.inverters.length }, 'Tool call completed');
      return data.inverters.length
        ? { ok: true, data }
        : { ok: true, data, meta: { message: 'No inverters are configured in OpenDTU.' } };
    } catch (error) {
      return this.fail(tool, error, started);
    }
  }

  async getLimitStatus(serial?: string): Promise<ToolResult<LimitStatusMap>> {
    const tool = TOOL_NAMES.getLimitStatus;
    const started = Date.now();
    const target = serial?.trim() || undefined;
    try {
      const data = await this.deps.client.getLimitStatus(target);
      this.deps.audit.record({ tool, result: 'success', durationMs: Date.now() - started, serial: target });
      this.deps.logger.debug({ tool, serial: target, entries: Object.keys(data).length }, 'Tool call completed');

      if (Object.keys(data).length) {
        return { ok: true, data };
      }
      return {
        ok: true,
        data,
        meta: {
          message: target ? `No limit data for serial ${target}.` : 'OpenDTU reported no inverters.'
        }
      };
    } catch (error) {
      return this.fail(tool, error, started, { serial: target });
    }
  }

  async setLimit(args: SetLimitArgs): Promise<ToolResult<AppliedLimit>> {
    const tool = TOOL_NAMES.setLimit;
    const started = Date.now();
    const input = {
      serial: args.serial,
      value: args.value,
      limitType: args.limitType ?? DEFAULT_LIMIT_TYPE
    };

    const validation = validateLimitCommand(input);
    if (!validation.valid) {
      return this.fail(tool, validation.error, started, {
        serial: input.serial.trim() || undefined,
        limitType: input.limitType,
        limitValue: input.value
      });
    }

    const command = validation.command;
    const description = describeLimitType(command.limitType);
    const auditTarget = {
      serial: command.serial,
      limitType: command.limitType,
      limitValue: command.value,
      persistent: description.persistent
    };

    try {
      return await this.lock.runExclusive(command.serial, async () => {
        if (this.deps.config.enforceMaxPower && !isRelativeLimit(command.limitType)) {
          await this.checkMaxPower(command);
        }

        const outcome = await this.deps.client.setLimit(command);
        if (!outcome.applied) {
          throw new OpenDtuError('ApplianceRejected', outcome.message, {
            details: {
              type: outcome.type,
              ...(outcome.code === undefined ? {} : { code: outcome.code })
            }
          });
        }

        this.deps.audit.record({ tool, result: 'success', durationMs: Date.now() - started, ...auditTarget });
        this.deps.logger.info(
          { tool, serial: command.serial, limitType: command.limitType, value: command.value },
          'Inverter limit applied'
        );

        const meta: Record<string, unknown> = {
          label: description.label,
          unit: description.unit,
          persistent: description.persistent,
          applianceMessage: outcome.message
        };
        if (description.advisory) {
          meta.advisory = description.advisory;
          const recent = this.deps.audit.countPersistentWrites(
            command.serial,
            this.deps.config.persistentWriteWindowSec
          );
          if (recent >= this.deps.config.persistentWriteAdvisoryThreshold) {
            meta.recentPersistentWrites = recent;
          }
        }

        return {
          ok: true as const,
          data: {
            serial: command.serial,
            applied: command.value,
            type: command.limitType
          },
          meta
        };
      });
    } catch (error) {
      return this.fail(tool, error, started, auditTarget);
    }
  }

  private async checkMaxPower(command: LimitCommand): Promise<void> {
    const statuses = await this.deps.client.getLimitStatus(command.serial);
    const maxPowerW = statuses[command.serial]?.maxPowerW ?? null;
    const bounded = validateLimitCommand(
      { serial: command.serial, value: command.value, limitType: command.limitType },
      { maxPowerW }
    );
    if (!bounded.valid) {
      throw bounded.error;
    }
  }

  private reject(tool: string, error: OpenDtuError): ToolResult<never> {
    return this.fail(tool, error, Date.now());
  }

  private fail(
    tool: string,
    error: unknown,
    started: number,
    target: { serial?: string; limitType?: number; limitValue?: number; persistent?: boolean } = {}
  ): ToolResult<never> {
    const mapped = asOpenDtuError(error);
    this.deps.audit.record({
      tool,
      result: mapped.kind === 'ApplianceRejected' ? 'rejected' : 'error',
      durationMs: Date.now() - started,
      errorKind: mapped.kind,
      message: mapped.message,
      ...target
    });

    if (mapped.kind === 'InternalError') {
      this.deps.logger.error({ tool, err: mapped.cause ?? mapped }, 'Tool call failed unexpectedly');
    } else {
      this.deps.logger.warn({ tool, kind: mapped.kind, message: mapped.message, ...target }, 'Tool call failed');
    }

    return { ok: false, error: toErrorPayload(mapped) };
  }
}
