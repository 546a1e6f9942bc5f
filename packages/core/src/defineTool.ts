import type { ZodTypeAny, z } from 'zod';
import type { BaseContextSchema, Part } from './index.js';

/**
 * Defines the structure required to define a tool using the defineTool helper.
 * The context type is inferred from the provided contextSchema.
 * @template TInputSchema Zod schema for input validation.
 * @template TContextSchema Zod schema for context validation. Defaults to BaseContextSchema.
 */
export interface ToolDefinition<
  TInputSchema extends ZodTypeAny = z.ZodUndefined,
  TContextSchema extends ZodTypeAny = typeof BaseContextSchema,
> {
  /** Unique name of the tool. */
  name: string;
  /** Description of what the tool does. */
  description: string;
  /** Zod schema used to validate input arguments. */
  inputSchema: TInputSchema;
  /** Zod schema used to validate the context object. */
  contextSchema: TContextSchema;
  /**
   * The core execution logic for the tool.
   * Receives validated arguments and a context object validated against contextSchema.
   */
  execute: (params: {
    context: z.infer<TContextSchema>;
    args: z.infer<TInputSchema>;
  }) => Promise<Part[]>;
}

/**
 * Defines a tool whose arguments and context are validated before the tool-specific
 * logic runs. Validation failures throw; errors from the tool itself propagate to the
 * caller unchanged.
 */
export function defineTool<
  TInputSchema extends ZodTypeAny = z.ZodUndefined,
  TContextSchema extends ZodTypeAny = typeof BaseContextSchema,
>(
  definition: ToolDefinition<TInputSchema, TContextSchema>,
): ToolDefinition<TInputSchema, TContextSchema> {
  const wrappedExecute = async (params: {
    context: z.infer<TContextSchema>;
    args: z.infer<TInputSchema>;
  }): Promise<Part[]> => {
    const parsedArgs = definition.inputSchema.safeParse(params.args);
    if (!parsedArgs.success) {
      const errorMessages = parsedArgs.error.issues
        .map((issue) => `${issue.path.join('.') || 'input'}: ${issue.message}`)
        .join('; ');
      throw new Error(`Input validation failed: ${errorMessages}`);
    }
    const parsedContext = definition.contextSchema.safeParse(params.context);
    if (!parsedContext.success) {
      throw new Error(`Context validation failed: ${parsedContext.error.message}`);
    }
    return definition.execute({ context: parsedContext.data, args: parsedArgs.data });
  };

  return {
    name: definition.name,
    description: definition.description,
    inputSchema: definition.inputSchema,
    contextSchema: definition.contextSchema,
    execute: wrappedExecute,
  };
}
