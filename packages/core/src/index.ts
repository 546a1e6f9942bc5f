import path from 'node:path';
import { type ZodTypeAny, z } from 'zod';

export const TextPartSchema = z.object({ type: z.literal('text'), value: z.string() });
export type TextPart = z.infer<typeof TextPartSchema>;

// The schema travels with the value so adapters can describe structured output.
export const JsonPartSchema = z.object({
  type: z.literal('json'),
  value: z.unknown(),
  schema: z.custom<ZodTypeAny>((val) => val instanceof z.ZodType, {
    message: 'Schema must be a Zod schema instance',
  }),
});
export type JsonPart<T extends ZodTypeAny = ZodTypeAny> = {
  type: 'json';
  value: z.infer<T>;
  schema: T;
};

export const PartSchema = z.union([TextPartSchema, JsonPartSchema]);
export type Part = TextPart | JsonPart;

// Schema for the dedicated error object
export const ToolErrorSchema = z.object({
  message: z.string(),
  suggestion: z.string().optional(),
});
export type ToolError = z.infer<typeof ToolErrorSchema>;

/** Context every tool receives; tool families extend it with their own collaborators. */
export const BaseContextSchema = z.object({
  /** The absolute path to the workspace root directory. */
  workspaceRoot: z.string(),
  /** If true, allows the tool to access paths outside the workspace root. Defaults to false. */
  allowOutsideWorkspace: z.boolean().optional(),
});
export type ToolExecuteOptions = z.infer<typeof BaseContextSchema>;

// --- Path Validation Utility ---

export interface PathValidationError {
  error: string;
  suggestion: string;
}

/**
 * Resolves a relative path against the workspace root and validates it.
 * By default, prevents resolving paths outside the workspace root.
 *
 * @param relativePathInput The relative path input by the user/tool.
 * @param workspaceRoot The absolute path to the workspace root.
 * @param allowOutsideRoot If true, allows paths outside the workspace root. Defaults to false.
 * @returns The resolved absolute path if valid, or a PathValidationError object if invalid.
 */
export function validateAndResolvePath(
  relativePathInput: string,
  workspaceRoot: string,
  allowOutsideRoot = false,
): string | PathValidationError {
  if (!relativePathInput || relativePathInput.trim() === '') {
    return {
      error: 'Path validation failed: Input path cannot be empty.',
      suggestion: 'Provide a valid relative path.',
    };
  }

  if (!allowOutsideRoot && path.isAbsolute(relativePathInput)) {
    return {
      error: `Path validation failed: Absolute paths are not allowed. Path: '${relativePathInput}'`,
      suggestion: 'Provide a path relative to the workspace root.',
    };
  }

  const resolvedPath = path.resolve(workspaceRoot, relativePathInput);
  const relativeToRoot = path.relative(workspaceRoot, resolvedPath);

  if (!allowOutsideRoot && (relativeToRoot.startsWith('..') || path.isAbsolute(relativeToRoot))) {
    return {
      error: `Path validation failed: Path must resolve within the workspace root ('${workspaceRoot}'). Relative Path: '${relativeToRoot}'`,
      suggestion: `Ensure the path '${relativePathInput}' is relative to the workspace root and does not attempt to go outside it.`,
    };
  }

  return resolvedPath;
}

// --- Part Helper Functions ---

export function textPart(value: string): TextPart {
  return { type: 'text', value };
}

export function jsonPart<T extends ZodTypeAny>(value: z.infer<T>, schema: T): JsonPart<T> {
  return { type: 'json', value, schema };
}

export * from './defineTool.js';
export * from './typeGuards.js';
export * from './errors.js';
export * from './timeout.js';
