/**
 * Telemetry hook for the engine.
 *
 * Controller events go to a replaceable handler, or to the console when
 * none is registered. The minimum level comes from
 * `AGENT_ENGINE_TELEMETRY_LEVEL` and defaults to `warning`.
 */
import { ErrorCode } from '../errors/types';
import { errorMessage } from '../errors/utils';

export type TelemetryEventLevel = 'info' | 'warning' | 'error';

interface SessionEvent {
  agentId: string;
  sessionId: string;
  phase: string;
}

export type TelemetryEvent =
  | (SessionEvent & { type: 'iteration_started'; iteration: number })
  | (SessionEvent & { type: 'iteration_advanced'; iteration: number; nextPhase: string })
  | (SessionEvent & { type: 'iteration_stalled'; iteration: number; durableHash: string })
  | (SessionEvent & { type: 'procedure_missing'; iteration: number })
  | (SessionEvent & { type: 'action_failed'; iteration: number; action: string; code: ErrorCode })
  | (SessionEvent & {
      type: 'session_paused';
      reason: 'required_state' | 'user_input';
      missingKeys: string[];
    })
  | (SessionEvent & { type: 'session_completed'; keys: string[] })
  | (SessionEvent & { type: 'session_failed'; keys: string[] });

export type TelemetryEventType = TelemetryEvent['type'];

export const TELEMETRY_EVENT_LEVELS: Record<TelemetryEventType, TelemetryEventLevel> = {
  iteration_started: 'info',
  iteration_advanced: 'info',
  session_completed: 'info',
  iteration_stalled: 'warning',
  procedure_missing: 'warning',
  session_paused: 'warning',
  action_failed: 'warning',
  session_failed: 'error',
};

export type TelemetryHandler = (event: TelemetryEvent, level: TelemetryEventLevel) => void;

export const TELEMETRY_LEVEL_ENV = 'AGENT_ENGINE_TELEMETRY_LEVEL';

let handler: TelemetryHandler | null = null;
const LEVEL_PRIORITY: Record<TelemetryEventLevel, number> = {
  info: 0,
  warning: 1,
  error: 2,
};

export function parseTelemetryLevel(level?: string): TelemetryEventLevel | null {
  if (!level) {
    return null;
  }
  const normalized = level.trim().toLowerCase();
  if (normalized === 'info' || normalized === 'warning' || normalized === 'error') {
    return normalized;
  }
  return null;
}

let minimumLevel: TelemetryEventLevel =
  parseTelemetryLevel(process.env[TELEMETRY_LEVEL_ENV]) ?? 'warning';

export function registerTelemetryHandler(nextHandler: TelemetryHandler | null): void {
  handler = nextHandler;
}

export function setTelemetryLevel(level: TelemetryEventLevel): void {
  minimumLevel = level;
}

export function getTelemetryLevel(): TelemetryEventLevel {
  return minimumLevel;
}

/**
 * Emit a controller event if its level meets the configured threshold.
 */
export function emitTelemetry(event: TelemetryEvent): void {
  const level = TELEMETRY_EVENT_LEVELS[event.type];
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[minimumLevel]) {
    return;
  }

  if (handler) {
    try {
      handler(event, level);
      return;
    } catch (error) {
      // Fall through to the console so the event is not lost.
      console.warn(`[Telemetry handler error] ${errorMessage(error)}`);
    }
  }

  const consoleFn =
    level === 'error' ? console.error : level === 'info' ? console.info : console.warn;
  consoleFn(`[Telemetry] ${event.type} ${event.agentId}/${event.sessionId} in ${event.phase}`, event);
}
