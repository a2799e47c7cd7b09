/**
 * Run Configuration Module
 *
 * Controls how the demo driver reports its results:
 * - TEXT: section headers and one line per case, for reading.
 * - JSON: the same sections as a JSON document, for piping.
 */

export type OutputFormat = "text" | "json";

export interface RunConfig {
  format: OutputFormat;
}

/**
 * Parse output format from CLI argument and/or environment variable.
 * CLI argument takes priority over environment variable.
 * Defaults to "text" when neither is provided or the value is unknown.
 */
export function parseOutputFormat(cliArg?: string, envVar?: string): OutputFormat {
  const raw = (cliArg ?? envVar ?? "text").trim().toLowerCase();
  if (raw === "json") return "json";
  return "text";
}

/** Build the run config from argv (`--format=json` or `--format json`) and env. */
export function loadRunConfig(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
): RunConfig {
  let cliArg: string | undefined;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg.startsWith("--format=")) {
      cliArg = arg.slice("--format=".length);
    } else if (arg === "--format" && i + 1 < argv.length) {
      cliArg = argv[i + 1];
      i++;
    }
  }
  return { format: parseOutputFormat(cliArg, env.NUMERIC_OUTPUT_FORMAT) };
}
