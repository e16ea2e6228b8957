/** Reported by `--version` and the MCP server handshake; matches package.json. */
export const DETASKLISTER_VERSION = '0.1.0';
