/**
 * Parsed form of a server endpoint reference:
 * - `local:<id>` for capability servers hosted in this process,
 * - `stdio:<command line>` for MCP servers spawned as child processes,
 * - `http://` / `https://` URLs for MCP servers reached over Streamable HTTP.
 */
export type ParsedEndpoint =
  | { kind: "local"; id: string }
  | { kind: "stdio"; command: string; args: string[] }
  | { kind: "http"; url: URL };

/** Splits a command line on whitespace, honouring single and double quotes. */
export function splitCommandLine(commandLine: string): string[] {
  const tokens: string[] = [];
  const pattern = /"([^"]*)"|'([^']*)'|(\S+)/g;
  for (const match of commandLine.matchAll(pattern)) {
    tokens.push(match[1] ?? match[2] ?? match[3] ?? "");
  }
  return tokens;
}

/** Returns the parsed endpoint, or `null` when the syntax is not recognised. */
export function parseEndpoint(endpoint: string): ParsedEndpoint | null {
  const trimmed = endpoint.trim();
  if (trimmed.startsWith("local:")) {
    const id = trimmed.slice("local:".length).trim();
    return /^[a-z0-9][a-z0-9._-]*$/i.test(id) ? { kind: "local", id } : null;
  }
  if (trimmed.startsWith("stdio:")) {
    const [command, ...args] = splitCommandLine(trimmed.slice("stdio:".length));
    return command ? { kind: "stdio", command, args } : null;
  }
  if (!URL.canParse(trimmed)) {
    return null;
  }
  const url = new URL(trimmed);
  if ((url.protocol !== "http:" && url.protocol !== "https:") || url.hostname.length === 0) {
    return null;
  }
  return { kind: "http", url };
}
