/**
 * @file environment configuration
 *
 * the environment is read once, explicitly, and handed to whatever needs it
 * so that tests never have to mutate process.env
 */

/** settings taken from environment variables */
export interface EnvironmentConfig {
  /** host of the metadata server, from GCE_METADATA_HOST */
  metadataHost?: string;
  /** whether to skip the compute engine probe, from NO_GCE_CHECK */
  skipComputeEngineCheck: boolean;
}

/**
 * reads the environment configuration
 * @param env environment variables (default: process.env)
 * @returns the parsed configuration
 */
export function readEnvironmentConfig(
  env: Record<string, string | undefined> = process.env,
): EnvironmentConfig {
  const metadataHost = env.GCE_METADATA_HOST?.trim();

  return {
    metadataHost: metadataHost ? metadataHost : undefined,
    skipComputeEngineCheck: env.NO_GCE_CHECK?.trim().toLowerCase() === 'true',
  };
}
