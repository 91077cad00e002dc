/**
 * Debug configuration module
 * Controls debug output for the expander components
 *
 * Debug Levels:
 * - EXPANDER_DEBUG=0 or unset: No debug output (default)
 * - EXPANDER_DEBUG=1: Standard debug output (files expanded, includes resolved)
 * - EXPANDER_DEBUG=2: Verbose debug output (directory listings, config sources)
 */

export type DebugLevel = 0 | 1 | 2;

export interface DebugConfig {
  components: {
    expander: DebugLevel;
    config: DebugLevel;
    cli: DebugLevel;
  };
}

let cachedConfig: DebugConfig | null = null;

function parseDebugLevel(value: string | undefined): DebugLevel {
  if (!value) return 0;
  const level = parseInt(value, 10);
  if (level === 2) return 2;
  if (level === 1) return 1;
  return 0;
}

/**
 * Get debug configuration based on environment variables
 *
 * EXPANDER_DEBUG_<COMPONENT>=1|2 overrides the global level for one component.
 */
export function getDebugConfig(): DebugConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const globalLevel = parseDebugLevel(process.env.EXPANDER_DEBUG);

  cachedConfig = {
    components: {
      expander: parseDebugLevel(process.env.EXPANDER_DEBUG_EXPANDER) || globalLevel,
      config: parseDebugLevel(process.env.EXPANDER_DEBUG_CONFIG) || globalLevel,
      cli: parseDebugLevel(process.env.EXPANDER_DEBUG_CLI) || globalLevel,
    },
  };

  return cachedConfig;
}

export type DebugComponent = keyof DebugConfig['components'];

/**
 * Check if debug is enabled for a specific component (level >= 1)
 */
export function isDebugEnabled(component: DebugComponent): boolean {
  return getDebugConfig().components[component] >= 1;
}

/**
 * Check if verbose debug is enabled for a specific component (level >= 2)
 */
export function isVerboseDebugEnabled(component: DebugComponent): boolean {
  return getDebugConfig().components[component] >= 2;
}

/**
 * Reset cached config (useful for testing)
 */
export function resetDebugConfig(): void {
  cachedConfig = null;
}
