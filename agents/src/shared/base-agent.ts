/**
 * Base agent class providing common functionality for all agents.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { createAgentLogger } from './logger.js';
import type { Agent, AgentConfig, AgentContext, AgentResult } from './types.js';

export abstract class BaseAgent<TInput, TOutput> implements Agent<TInput, TOutput> {
  abstract config: AgentConfig;
  abstract inputSchema: ZodType<TInput, ZodTypeDef, unknown>;
  abstract outputSchema: ZodType<TOutput, ZodTypeDef, unknown>;

  /**
   * Validate input, run, validate output. Failures come back as a result
   * carrying the original error, never as a rejection. Each call gets its own
   * logger, so one instance can serve concurrent executions.
   */
  async execute(
    input: TInput,
    context?: Partial<Omit<AgentContext, 'logger'>>,
  ): Promise<AgentResult<TOutput>> {
    const startTime = Date.now();
    const logger = createAgentLogger(this.config.name);

    const fullContext: AgentContext = {
      timestamp: new Date(),
      ...context,
      logger,
    };
    const { logger: _logger, signal: _signal, ...reportedContext } = fullContext;

    logger.info(`Starting execution`, { input });

    try {
      // Validate input
      const validatedInput = this.inputSchema.parse(input);

      // Run the agent's main logic
      const output = await this.run(validatedInput, fullContext);

      // Validate output
      const validatedOutput = this.outputSchema.parse(output);

      const duration = Date.now() - startTime;
      logger.info(`Completed successfully`, { duration });

      return {
        success: true,
        data: validatedOutput,
        duration,
        logs: logger.entries(),
        context: reportedContext,
      };
    } catch (err) {
      const duration = Date.now() - startTime;
      const errorMessage = err instanceof Error ? err.message : String(err);

      logger.error(`Execution failed: ${errorMessage}`, err);

      return {
        success: false,
        error: errorMessage,
        errorName: err instanceof Error ? err.name : undefined,
        cause: err,
        duration,
        logs: logger.entries(),
        context: reportedContext,
      };
    }
  }

  /**
   * Abstract method to be implemented by each agent.
   * Contains the core agent logic.
   */
  protected abstract run(input: TInput, context: AgentContext): Promise<TOutput>;
}
