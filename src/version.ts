/** Package version, reported by the CLI and in SARIF output. */
export const VERSION = '1.0.0';
