/**
 * Shared types for tools to prevent circular dependencies
 */

import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import type { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { Failure, Success, type Tool } from '../domain/types';
import { errorMessage, isApplicationError } from '../errors/index';
import { createTimer } from '../lib/logger';
import type { ClusterManager } from '../services/kubernetes/index';

export interface ToolSpec<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  schema: S;
  run: (params: z.output<S>, manager: ClusterManager, logger: Logger) => Promise<string>;
}

/**
 * A tool definition not yet bound to a cluster manager
 */
export interface ClusterTool {
  name: string;
  description: string;
  bind: (manager: ClusterManager) => Tool;
}

function describeIssues(issues: z.ZodIssue[]): string {
  return issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Wrap a tool body with parameter validation, logging and Result conversion
 */
export function defineTool<S extends z.ZodTypeAny>(spec: ToolSpec<S>): ClusterTool {
  return {
    name: spec.name,
    description: spec.description,
    bind: (manager) => ({
      name: spec.name,
      description: spec.description,
      schema: { ...zodToJsonSchema(spec.schema, { $refStrategy: 'none' }) },
      execute: async (params, logger) => {
        const toolLogger = logger.child({ tool: spec.name, operationId: nanoid(10) });

        const parsed = spec.schema.safeParse(params);
        if (!parsed.success) {
          toolLogger.warn({ issues: parsed.error.issues }, 'Invalid tool parameters');
          return Failure(`Invalid parameters: ${describeIssues(parsed.error.issues)}`);
        }

        const timer = createTimer(toolLogger, spec.name);
        try {
          const text = await spec.run(parsed.data, manager, toolLogger);
          timer.end();
          return Success(text);
        } catch (error) {
          timer.error(error, isApplicationError(error) ? { code: error.code } : {});
          return Failure(errorMessage(error));
        }
      },
    }),
  };
}
