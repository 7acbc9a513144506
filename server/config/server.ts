/**
 * Server Configuration
 *
 * Ports, CORS origins and body parsing limits.
 */

/** Development origins always allowed outside production */
export const DEV_ORIGINS = ["http://localhost:3000", "http://localhost:5173"] as const;

/**
 * Returns the list of allowed origins for the given environment.
 * `allowedOrigins` is the comma-separated ALLOWED_ORIGINS value.
 */
export function getAllowedOrigins(allowedOrigins: string | undefined, nodeEnv: string): string[] {
  const envOrigins =
    allowedOrigins
      ?.split(",")
      .map((o) => o.trim())
      .filter(Boolean) ?? [];
  if (nodeEnv === "production") {
    return envOrigins;
  }
  return [...envOrigins, ...DEV_ORIGINS];
}

/** Express body parser size limit */
export const BODY_PARSE_LIMIT = "1mb";
