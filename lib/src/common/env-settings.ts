/** The node.js environment variable interface */
export interface Env {
  [key: string]: string | undefined;
}

/**
 * Get a string from the environment variable.
 * @throws Error if the variable is not found or empty and no default value was provided.
 */
export const getEnvVariableString = (
  env: Env,
  field: string,
  fallbackField?: string,
  defaultValue?: string,
): string => {
  const value = env[field] ?? (fallbackField ? env[fallbackField] : undefined);
  if (typeof value !== 'string' || value === '') {
    if (defaultValue) {
      return defaultValue;
    }
    throw new Error(
      `The environment variable ${field} must be a non-empty string.`,
    );
  }
  return value;
};

/**
 * Get a number from the environment variable.
 * @throws Error if the variable is not found or empty and no default value was provided.
 */
export const getEnvVariableNumber = (
  env: Env,
  field: string,
  fallbackField?: string,
  defaultValue?: number,
): number => {
  const raw = env[field] ?? (fallbackField ? env[fallbackField] : undefined);
  if ((raw === undefined || raw === '') && defaultValue !== undefined) {
    return defaultValue;
  }
  const value = raw === undefined || raw === '' ? NaN : Number(raw);
  if (Number.isNaN(value)) {
    throw new Error(`The environment variable ${field} must be a number.`);
  }
  return value;
};

/**
 * Get a boolean from the environment variable. The true/1 value return true, false/0 return false. Everything else throws an error.
 * @throws Error if the variable is not found or empty and no default value was provided.
 */
export const getEnvVariableBoolean = (
  env: Env,
  field: string,
  fallbackField?: string,
  defaultValue?: boolean,
): boolean => {
  const raw = env[field] ?? (fallbackField ? env[fallbackField] : undefined);
  if ((raw === undefined || raw === '') && defaultValue !== undefined) {
    return defaultValue;
  }
  const value = (raw ?? '').toLowerCase();
  if (value === 'true' || value === '1') {
    return true;
  }
  if (value === 'false' || value === '0') {
    return false;
  }
  throw new Error(`The environment variable ${field} must be a boolean.`);
};

/**
 * Get one of the allowed string values from the environment variable.
 * @throws Error if the value is not one of the allowed values.
 */
export const getEnvVariableOneOf = <T extends string>(
  env: Env,
  field: string,
  values: readonly T[],
  fallbackField?: string,
  defaultValue?: T,
): T => {
  const value = getEnvVariableString(env, field, fallbackField, defaultValue);
  const match = values.find((v) => v === value);
  if (match === undefined) {
    throw new Error(
      `The environment variable ${field} must be one of ${values.join(', ')}.`,
    );
  }
  return match;
};

export interface SettingOptions {
  /** Only read the prefixed variable and not the one with the fallback prefix. */
  skipFallback?: boolean;
}

/** Reads single settings. The constant name is appended to the env prefixes. */
export interface SettingsReader {
  string(constantName: string, defaultValue?: string, options?: SettingOptions): string;
  number(constantName: string, defaultValue?: number, options?: SettingOptions): number;
  boolean(constantName: string, defaultValue?: boolean, options?: SettingOptions): boolean;
  oneOf<T extends string>(
    constantName: string,
    values: readonly T[],
    defaultValue?: T,
    options?: SettingOptions,
  ): T;
}

/**
 * Creates a reader that loads settings from the ENV variables. The variable
 * with the specific prefix is checked first and the fallback prefix second.
 * @param env The process.env variable or a custom object
 * @param envPrefix The prefix for the env variables to check first (e.g. "MSG_OUTBOX_" or "MSG_INBOX_").
 * @param envPrefixFallback The fallback prefix if the other is not found. Useful for defining settings that should be used for both outbox and inbox.
 */
export const createEnvSettingsReader = (
  env: Env,
  envPrefix: string,
  envPrefixFallback: string,
): SettingsReader => {
  const fields = (name: string, options?: SettingOptions) =>
    [
      `${envPrefix}${name}`,
      options?.skipFallback ? undefined : `${envPrefixFallback}${name}`,
    ] as const;
  return {
    string: (name, defaultValue, options) => {
      const [field, fallback] = fields(name, options);
      return getEnvVariableString(env, field, fallback, defaultValue);
    },
    number: (name, defaultValue, options) => {
      const [field, fallback] = fields(name, options);
      return getEnvVariableNumber(env, field, fallback, defaultValue);
    },
    boolean: (name, defaultValue, options) => {
      const [field, fallback] = fields(name, options);
      return getEnvVariableBoolean(env, field, fallback, defaultValue);
    },
    oneOf: (name, values, defaultValue, options) => {
      const [field, fallback] = fields(name, options);
      return getEnvVariableOneOf(env, field, values, fallback, defaultValue);
    },
  };
};

/**
 * Creates a reader that does not read anything but records all the settings
 * and their default values as env template lines.
 */
const createTemplateSettingsReader = (
  envPrefix: string,
  envPrefixFallback: string,
  lines: string[],
): SettingsReader => {
  const record = (
    name: string,
    defaultValue: string | number | boolean | undefined,
    options?: SettingOptions,
  ) => {
    const value = defaultValue === undefined ? '' : `${defaultValue}`;
    lines.push(`${envPrefix}${name}=${value}`);
    if (!options?.skipFallback) {
      lines.push(`# ${envPrefixFallback}${name}=${value}`);
    }
  };
  return {
    string: (name, defaultValue, options) => {
      record(name, defaultValue, options);
      return defaultValue ?? '';
    },
    number: (name, defaultValue, options) => {
      record(name, defaultValue, options);
      return defaultValue ?? 0;
    },
    boolean: (name, defaultValue, options) => {
      record(name, defaultValue, options);
      return defaultValue ?? false;
    },
    oneOf: (name, values, defaultValue, options) => {
      record(name, defaultValue, options);
      return defaultValue ?? values[0];
    },
  };
};

/**
 * Defines a group of settings that can be loaded from ENV variables and
 * printed as an env template with their default values.
 * @param envPrefix The prefix for the env variables to check first.
 * @param envPrefixFallback The fallback prefix if the other is not found.
 * @param read Maps the settings to the settings object.
 */
export const defineEnvSettings = <T>(
  envPrefix: string,
  envPrefixFallback: string,
  read: (reader: SettingsReader) => T,
): {
  load: (env?: Env) => T;
  template: () => string;
} => ({
  load: (env: Env = process.env) =>
    read(createEnvSettingsReader(env, envPrefix, envPrefixFallback)),
  template: () => {
    const lines: string[] = [];
    read(createTemplateSettingsReader(envPrefix, envPrefixFallback, lines));
    return `${lines.join('\n')}\n`;
  },
});

export const fallbackEnvPrefix = 'MSG_';
export const inboxEnvPrefix = 'MSG_INBOX_';
export const outboxEnvPrefix = 'MSG_OUTBOX_';
