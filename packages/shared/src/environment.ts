import { z } from "zod";
import { EnvironmentError } from "./errors";

type ZodSchemaShape = z.ZodRawShape;

/**
 * Read every key of `schema` from `source` (process.env by default) and coerce
 * the raw strings into the shape zod expects for that key.
 */
export function buildDynamic(
  schema: z.ZodObject<ZodSchemaShape>,
  source: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  return Object.keys(schema.shape).reduce(
    (acc, key) => {
      acc[key] = coerceValue(key, source[key], schema);
      return acc;
    },
    {} as Record<string, unknown>,
  );
}

function coerceValue(
  key: string,
  value: string | undefined,
  schema: z.ZodObject<ZodSchemaShape>,
): unknown {
  if (value === undefined || value === "") return undefined;

  let fieldSchema: z.ZodTypeAny = schema.shape[key];

  // Unwrap ZodDefault and ZodOptional to get the underlying type
  while (
    fieldSchema instanceof z.ZodDefault ||
    fieldSchema instanceof z.ZodOptional
  ) {
    fieldSchema = fieldSchema._def.innerType;
  }

  if (fieldSchema instanceof z.ZodNumber) {
    return Number(value);
  } else if (fieldSchema instanceof z.ZodBoolean) {
    return value.toLowerCase() === "true";
  } else if (fieldSchema instanceof z.ZodArray) {
    try {
      return JSON.parse(value);
    } catch {
      return value.split(",").map((item) => item.trim());
    }
  } else if (fieldSchema instanceof z.ZodObject) {
    try {
      return JSON.parse(value);
    } catch {
      return value;
    }
  }

  return value;
}

/**
 * Defer validation until the first property read, so importing a module that
 * declares its variables never throws on its own.
 */
export function lazilyValidate<T extends ZodSchemaShape>(
  schema: z.ZodObject<T>,
  environmentMap: Record<string, unknown>,
): z.infer<z.ZodObject<T>> {
  let _variables: z.infer<z.ZodObject<T>> | null = null;

  function validateEnvironment() {
    if (_variables) return _variables;

    const parsed = schema.safeParse(environmentMap);

    if (!parsed.success) {
      throw new EnvironmentError(
        parsed.error.issues.map(
          (issue) => `${issue.path.join(".")}: ${issue.message}`,
        ),
      );
    }

    _variables = parsed.data;
    return _variables;
  }

  return new Proxy({} as z.infer<z.ZodObject<T>>, {
    get(_target, prop) {
      const validated = validateEnvironment();
      return validated[prop as keyof typeof validated];
    },
  });
}

const sharedSchema = z.object({
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .optional(),
});

export const variables = lazilyValidate(
  sharedSchema,
  buildDynamic(sharedSchema),
);
