export interface EnvDefaults {
  outDir?: string;
  cookies?: string;
  userDataDir?: string;
}

function read(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

export function envDefaults(env: NodeJS.ProcessEnv = process.env): EnvDefaults {
  return {
    outDir: read(env, "SCROLLSNAP_OUT"),
    cookies: read(env, "SCROLLSNAP_COOKIES"),
    userDataDir: read(env, "SCROLLSNAP_USER_DATA_DIR")
  };
}
