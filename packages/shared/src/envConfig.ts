import { z } from 'zod';

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);
const DEFAULT_LIST_SEPARATOR = /[,\s]+/;

export type EnvSource = Record<string, string | undefined>;

export type LoadEnvConfigOptions = {
  env?: EnvSource;
  context?: string;
};

export class EnvConfigError extends Error {
  readonly context: string;
  readonly issues: string[];

  constructor(context: string, issues: string[]) {
    const details = issues.map((issue) => `  - ${issue}`).join('\n');
    super(`[${context}] Invalid environment configuration\n${details}`);
    this.name = 'EnvConfigError';
    this.context = context;
    this.issues = issues;
  }
}

export function loadEnvConfig<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, options?: LoadEnvConfigOptions): T {
  const envSource: EnvSource = { ...(options?.env ?? process.env) };
  const context = options?.context ?? 'cohortforge';

  const result = schema.safeParse(envSource);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join('.') : '<root>';
      return `${location}: ${issue.message}`;
    });
    throw new EnvConfigError(context, issues);
  }
  return result.data;
}

type CommonOptions<T> = {
  required?: boolean;
  defaultValue?: T;
  description?: string;
};

function describeVar(ctx: z.RefinementCtx, description?: string): string {
  if (description) {
    return description;
  }
  const last = ctx.path.length > 0 ? ctx.path[ctx.path.length - 1] : undefined;
  return last === undefined ? 'value' : String(last);
}

function isBlank(value: unknown): value is null | undefined | '' {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

/**
 * Shared handling for unset variables: fall back to the default, flag a
 * required variable, or pass `undefined` through.
 */
function resolveUnset<T>(ctx: z.RefinementCtx, options: CommonOptions<T> | undefined): T | undefined {
  if (options?.defaultValue !== undefined) {
    return options.defaultValue;
  }
  if (options?.required) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing required ${describeVar(ctx, options.description)}` });
  }
  return undefined;
}

export function booleanVar(options?: CommonOptions<boolean>) {
  return z.union([z.string(), z.boolean()]).nullable().optional().transform((value, ctx): boolean | undefined => {
    if (isBlank(value)) {
      return resolveUnset(ctx, options);
    }
    if (typeof value === 'boolean') {
      return value;
    }
    const normalized = value.trim().toLowerCase();
    if (TRUE_VALUES.has(normalized)) {
      return true;
    }
    if (FALSE_VALUES.has(normalized)) {
      return false;
    }
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid ${describeVar(ctx, options?.description)}. Accepted boolean values: ${[...TRUE_VALUES, ...FALSE_VALUES].join(', ')}`
    });
    return z.NEVER;
  });
}

export type IntegerVarOptions = CommonOptions<number> & {
  min?: number;
  max?: number;
};

export function integerVar(options?: IntegerVarOptions) {
  return z.union([z.string(), z.number()]).nullable().optional().transform((value, ctx): number | undefined => {
    if (isBlank(value)) {
      return resolveUnset(ctx, options);
    }
    const description = describeVar(ctx, options?.description);
    const parsed = typeof value === 'number' ? Math.trunc(value) : Number(value.trim());
    if (!Number.isInteger(parsed)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected ${description} to be an integer` });
      return z.NEVER;
    }
    if (options?.min !== undefined && parsed < options.min) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${description} must be >= ${options.min}` });
      return z.NEVER;
    }
    if (options?.max !== undefined && parsed > options.max) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${description} must be <= ${options.max}` });
      return z.NEVER;
    }
    return parsed;
  });
}

export type StringVarOptions = CommonOptions<string> & {
  lowercase?: boolean;
  pattern?: RegExp;
};

export function stringVar(options?: StringVarOptions) {
  return z.string().nullable().optional().transform((value, ctx): string | undefined => {
    if (isBlank(value)) {
      return resolveUnset(ctx, options);
    }
    const trimmed = value.trim();
    const normalized = options?.lowercase ? trimmed.toLowerCase() : trimmed;
    if (options?.pattern && !options.pattern.test(normalized)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${describeVar(ctx, options.description)} does not match expected pattern`
      });
      return z.NEVER;
    }
    return normalized;
  });
}

export function enumVar<T extends readonly [string, ...string[]]>(values: T, options?: CommonOptions<T[number]>) {
  return z.string().nullable().optional().transform((value, ctx): T[number] | undefined => {
    if (isBlank(value)) {
      return resolveUnset(ctx, options);
    }
    const normalized = value.trim().toLowerCase();
    const match = values.find((entry) => entry === normalized);
    if (match === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid ${describeVar(ctx, options?.description)}. Expected one of: ${values.join(', ')}`
      });
      return z.NEVER;
    }
    return match;
  });
}

export type StringListVarOptions = CommonOptions<string[]> & {
  separator?: RegExp | string;
  unique?: boolean;
};

export function stringListVar(options?: StringListVarOptions) {
  return z.union([z.string(), z.array(z.string())]).nullable().optional().transform((value, ctx): string[] => {
    if (isBlank(value)) {
      return resolveUnset(ctx, options) ?? [];
    }
    const entries = (Array.isArray(value) ? value : value.split(options?.separator ?? DEFAULT_LIST_SEPARATOR))
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0);
    return options?.unique ? Array.from(new Set(entries)) : entries;
  });
}
