import { configSchema, type Config } from "@/config/schema";
import * as constants from "@/config/constants";
import { config as loadDotenv } from "dotenv";

let cachedConfig: Config | null = null;

/**
 * Load and validate configuration from environment variables
 * Throws on validation failure with detailed error messages
 */
export function loadConfig(): Config {
  if (cachedConfig) {
    return cachedConfig;
  }

  // Load .env file
  loadDotenv();

  try {
    const result = configSchema.parse(process.env);
    cachedConfig = Object.freeze(result);
    return cachedConfig;
  } catch (error) {
    if (error instanceof Error) {
      console.error("❌ Configuration validation failed:");
      console.error(error.message);

      if (error.message.includes("SQL_DIALECT")) {
        console.error(
          "💡 SQL_DIALECT must be one of: " + Object.keys(constants.PARSER_DATABASE).join(", "),
        );
      }
    }
    throw error;
  }
}

/**
 * Get current configuration (loads if not already cached)
 */
export function getConfig(): Config {
  return loadConfig();
}

/**
 * Reset cached config (useful for testing)
 */
export function resetConfig(): void {
  cachedConfig = null;
}

// Export constants for convenience
export { constants };
