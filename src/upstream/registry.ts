/**
 * Operation registry: maps operation names to their configured definitions.
 * Built once at startup from validated config. Also owns parameter validation,
 * so a bad request is rejected before it touches a credential or the limiter.
 */

import { z } from 'zod';
import { logger } from '../shared/logger.js';
import { ValidationError } from '../shared/errors.js';
import type { OperationConfig } from '../config/types.js';
import type { OperationParams } from '../shared/types.js';
import type { OperationDefinition } from './types.js';

const ScalarParamSchema = z.union([z.string(), z.number(), z.boolean()]);

/** Runtime shape of operation parameters: scalars or lists of scalars. */
export const OperationParamsSchema = z.record(
  z.string(),
  z.union([ScalarParamSchema, z.array(ScalarParamSchema)]),
);

/** A validated call, ready for fingerprinting and dispatch. */
export interface ResolvedCall {
  operation: OperationDefinition;
  params: OperationParams;
}

export class OperationRegistry {
  private readonly operations: Map<string, OperationDefinition>;

  constructor(operations: OperationDefinition[]) {
    this.operations = new Map(operations.map((op) => [op.name, op]));
  }

  /** Check whether an operation name is registered. */
  has(name: string): boolean {
    return this.operations.has(name);
  }

  /** All registered operations, in config order. */
  getAll(): OperationDefinition[] {
    return Array.from(this.operations.values());
  }

  /** Number of registered operations. */
  get size(): number {
    return this.operations.size;
  }

  /**
   * Validate an operation name and its parameters.
   * @throws ValidationError for an unknown operation, malformed params, or a missing required param
   */
  resolve(name: string, params: unknown): ResolvedCall {
    const operation = this.operations.get(name);
    if (!operation) {
      const available = Array.from(this.operations.keys()).join(', ');
      throw new ValidationError(`Unknown operation '${name}'. Available: ${available}`);
    }

    const parsed = OperationParamsSchema.safeParse(params ?? {});
    if (!parsed.success) {
      throw new ValidationError(
        `Invalid params for '${name}': ${z.prettifyError(parsed.error)}`,
      );
    }

    const missing = operation.requiredParams.filter((param) => isBlank(parsed.data[param]));
    if (missing.length > 0) {
      throw new ValidationError(
        `Missing required param(s) for '${name}': ${missing.join(', ')}`,
      );
    }

    return { operation, params: parsed.data };
  }
}

function isBlank(value: OperationParams[string] | undefined): boolean {
  if (value === undefined) return true;
  if (typeof value === 'string') return value.trim() === '';
  if (Array.isArray(value)) return value.length === 0;
  return false;
}

/** Build the registry from validated config. */
export function buildRegistry(operations: OperationConfig[]): OperationRegistry {
  for (const op of operations) {
    logger.info(
      { operation: op.name, path: op.path, resourceClass: op.resourceClass },
      `Registered operation: ${op.name} -> ${op.path}`,
    );
  }
  return new OperationRegistry(operations);
}
