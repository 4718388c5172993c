import pc from "picocolors";

export interface CommandResult {
  payload: unknown;
  lines: string[];
}

export function printCommandResult(result: CommandResult, jsonMode: boolean): void {
  const body = jsonMode ? JSON.stringify(result.payload, null, 2) : result.lines.join("\n");
  if (body) {
    process.stdout.write(body.endsWith("\n") ? body : `${body}\n`);
  }
}

export function successLine(text: string): string {
  return `${pc.green("✔")} ${text}`;
}

export function warnLine(text: string): string {
  return `${pc.yellow("!")} ${text}`;
}

export function dimLine(text: string): string {
  return pc.dim(text);
}
