export interface RegistryOptions {
  /** Movement records kept per unit */
  readonly logCapacity: number;
}

export const DEFAULT_REGISTRY_OPTIONS: RegistryOptions = {
  logCapacity: 50,
};

/**
 * Validates and merges user options with defaults
 * @param userOptions - Partial registry options
 * @returns Complete validated options
 */
export function validateRegistryOptions(
  userOptions: Partial<RegistryOptions> = {}
): RegistryOptions {
  const options: RegistryOptions = {
    ...DEFAULT_REGISTRY_OPTIONS,
    ...userOptions,
  };

  if (!Number.isInteger(options.logCapacity) || options.logCapacity < 0) {
    throw new Error(
      `Invalid logCapacity: ${options.logCapacity}. Must be a non-negative integer.`
    );
  }

  return options;
}
