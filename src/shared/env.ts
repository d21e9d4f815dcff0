/** Environment variable names. */
export const BRIDGE_ENV = {
  DATA_DIR: "MUXBRIDGE_DATA_DIR",
  LOG_LEVEL: "MUXBRIDGE_LOG_LEVEL",
  LOGIN_MESSAGES_FD: "MUXBRIDGE_LOGIN_MESSAGES_FD",
} as const;

export function getEnv(key: keyof typeof BRIDGE_ENV): string | undefined {
  return process.env[BRIDGE_ENV[key]];
}

/** Reads a variable and removes it so spawned children do not inherit it. */
export function takeEnv(key: keyof typeof BRIDGE_ENV): string | undefined {
  const value = process.env[BRIDGE_ENV[key]];
  delete process.env[BRIDGE_ENV[key]];
  return value;
}
