export type LogEvent = Readonly<{ type: string } & Record<string, unknown>>;

export type Log = (event: LogEvent) => void;

// NOTE: Keep logs structured and privacy-preserving. Never include the passphrase or message text.
export const logEvent: Log = (event) => {
  console.log(
    JSON.stringify({
      ts: new Date().toISOString(),
      ...event,
    }),
  );
};

export function errorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
}

export function describeError(err: unknown): { name?: string; message: string; code?: string } {
  if (err instanceof Error) {
    const code = errorCode(err);
    return { name: err.name, message: err.message, ...(code ? { code } : {}) };
  }
  return { message: String(err) };
}
