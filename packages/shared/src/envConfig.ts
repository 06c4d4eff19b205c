import { z } from 'zod';

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

export type EnvSource = Record<string, string | undefined>;

export type LoadEnvConfigOptions = {
  env?: EnvSource;
  context?: string;
};

export class EnvConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EnvConfigError';
  }
}

type EnvIssueTarget = {
  path: (string | number)[];
  message: string;
};

function formatIssue({ path, message }: EnvIssueTarget): string {
  const location = path.length > 0 ? path.join('.') : '<root>';
  return `${location}: ${message}`;
}

export function formatConfigIssues(context: string, heading: string, issues: EnvIssueTarget[]): string {
  const details = issues.map((issue) => `  - ${formatIssue(issue)}`).join('\n');
  return `[${context}] ${heading}\n${details}`;
}

export function loadEnvConfig<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, options?: LoadEnvConfigOptions): T {
  const envSource: EnvSource = { ...(options?.env ?? process.env) };
  const context = options?.context ?? 'superevents';

  const result = schema.safeParse(envSource);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path,
      message: issue.message
    }));
    throw new EnvConfigError(formatConfigIssues(context, 'Invalid environment configuration', issues));
  }

  return result.data;
}

function describe(name: string | number | undefined, description?: string): string {
  if (description) {
    return description;
  }
  if (typeof name === 'string' && name.length > 0) {
    return name;
  }
  if (typeof name === 'number') {
    return name.toString();
  }
  return 'value';
}

type VarOptions<T> = {
  required?: boolean;
  defaultValue?: T;
  description?: string;
};

export function booleanVar(options?: VarOptions<boolean>) {
  return z.union([z.string(), z.boolean()]).nullable().optional().transform((value, ctx) => {
    const pathName = ctx.path.length > 0 ? ctx.path[ctx.path.length - 1] : undefined;
    const description = describe(pathName, options?.description);

    if (value === null || value === undefined || (typeof value === 'string' && value.trim() === '')) {
      if (options?.defaultValue !== undefined) {
        return options.defaultValue;
      }
      if (options?.required) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing required ${description}` });
        return z.NEVER;
      }
      return undefined;
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

    const accepted = [...TRUE_VALUES, ...FALSE_VALUES].map((entry) => `'${entry}'`).join(', ');
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid ${description}. Accepted boolean values: ${accepted}`
    });
    return z.NEVER;
  });
}

export type StringVarOptions = VarOptions<string> & {
  lowercase?: boolean;
  allowed?: readonly string[];
};

export function stringVar(options?: StringVarOptions) {
  return z.string().optional().transform((value, ctx) => {
    const pathName = ctx.path.length > 0 ? ctx.path[ctx.path.length - 1] : undefined;
    const description = describe(pathName, options?.description);

    const raw = value?.trim() ?? '';
    if (raw.length === 0) {
      if (options?.defaultValue !== undefined) {
        return options.lowercase ? options.defaultValue.toLowerCase() : options.defaultValue;
      }
      if (options?.required) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing required ${description}` });
        return z.NEVER;
      }
      return undefined;
    }

    const normalized = options?.lowercase ? raw.toLowerCase() : raw;
    if (options?.allowed && !options.allowed.includes(normalized)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid ${description}. Expected one of: ${options.allowed.join(', ')}`
      });
      return z.NEVER;
    }

    return normalized;
  });
}
