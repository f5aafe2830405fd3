import { z } from "zod";
import { InvalidJsonError, SchemaValidationError } from "../errors";
import { readArtifact } from "./util";

/**
 * Parse JSON text and validate it, naming `source` in any error.
 */
export function parseJsonWithSchema<T>(
  content: string,
  source: string,
  schema: z.ZodType<T>,
): T {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch {
    throw new InvalidJsonError(`Invalid JSON in file: ${source}`);
  }

  const result = schema.safeParse(data);
  if (!result.success) {
    throw new SchemaValidationError(
      `Schema validation failed for ${source}: ${result.error.message}`,
    );
  }

  return result.data;
}

export async function readJsonWithSchema<T>(
  filePath: string,
  schema: z.ZodType<T>,
): Promise<T> {
  const content = await readArtifact(filePath);
  return parseJsonWithSchema(content, filePath, schema);
}
