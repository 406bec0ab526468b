// Should be used instead of referencing process directly in case we don't
// run in node.js
export function safelyAccessEnvVar(name: string, toLowerCase = false) {
  try {
    return toLowerCase ? process.env[name]?.toLowerCase() : process.env[name];
  } catch {
    return undefined;
  }
}

export function requireEnvVar(name: string): string {
  const value = safelyAccessEnvVar(name);
  if (!value) {
    throw new Error(`${name} environment variable is required`);
  }
  return value;
}
