const args = process.argv.slice(2);

export function hasFlag(name: string, argv: string[] = args): boolean {
  return argv.includes(`--${name}`);
}

// A following token that is itself a flag is not taken as the value
export function getFlag(name: string, argv: string[] = args): string | undefined {
  const idx = argv.indexOf(`--${name}`);
  if (idx === -1 || idx + 1 >= argv.length) return undefined;
  const value = argv[idx + 1];
  return value.startsWith("--") ? undefined : value;
}
