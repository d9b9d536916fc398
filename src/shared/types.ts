/**
 * Shared value and response types.
 * These types define the contract between the relay core and its callers.
 */

/** A JSON-compatible primitive. */
export type JsonPrimitive = string | number | boolean | null;

/** Any JSON-compatible value. Cached results and upstream bodies are this shape. */
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

/** A single operation parameter: a scalar or a list of scalars. */
export type ParamValue = string | number | boolean | Array<string | number | boolean>;

/** Parameters for one logical operation. */
export type OperationParams = Record<string, ParamValue>;

/** Error body returned by every HTTP error path. */
export interface ErrorResponse {
  error: {
    message: string;
    type: string;
    code: string | null;
  };
}
