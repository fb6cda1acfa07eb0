/**
 * Shared types and interfaces for all agents.
 */

import type { ZodType, ZodTypeDef } from 'zod';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface AgentLog {
  timestamp: Date;
  level: LogLevel;
  message: string;
  data?: unknown;
}

/** Logging sink handed to pipeline code; one instance per execution. */
export interface AgentLogger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

export interface AgentContext {
  runId?: string;
  timestamp: Date;
  signal?: AbortSignal;
  logger: AgentLogger;
  metadata?: Record<string, unknown>;
}

export interface AgentResult<T> {
  success: boolean;
  data?: T;
  error?: string;
  /** Class name of the failure, e.g. `ProviderRateLimitError`. */
  errorName?: string;
  cause?: unknown;
  duration: number;
  logs: AgentLog[];
  context: Omit<AgentContext, 'logger' | 'signal'>;
}

export interface AgentConfig {
  name: string;
  description: string;
  version: string;
}

export interface Agent<TInput, TOutput> {
  config: AgentConfig;
  inputSchema: ZodType<TInput, ZodTypeDef, unknown>;
  outputSchema: ZodType<TOutput, ZodTypeDef, unknown>;
  execute(
    input: TInput,
    context?: Partial<Omit<AgentContext, 'logger'>>,
  ): Promise<AgentResult<TOutput>>;
}
