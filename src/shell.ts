const SAFE_TOKEN = /^[A-Za-z0-9_./,:=@%+-]+$/;

export function shellQuote(value: string): string {
  if (SAFE_TOKEN.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'"'"'`)}'`;
}

export function isValidEnvName(key: string): boolean {
  return /^[A-Za-z_][A-Za-z0-9_]*$/.test(key);
}

export function formatCommandLine(
  command: string,
  args: string[],
  env: Record<string, string> = {},
): string {
  const assignments = Object.entries(env).map(([key, value]) => {
    if (!isValidEnvName(key)) {
      throw new Error(`Invalid environment variable name: ${key}`);
    }
    return `${key}=${shellQuote(value)}`;
  });
  const prefix = assignments.length > 0 ? ["env", ...assignments] : [];
  return [...prefix, shellQuote(command), ...args.map((arg) => shellQuote(arg))].join(" ");
}
