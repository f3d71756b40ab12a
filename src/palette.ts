import chalk from "chalk";

export type Palette = chalk.Chalk;

/** Terminal colors for console reports. Disabled palettes produce plain text. */
export function createPalette(enabled: boolean): Palette {
  return new chalk.Instance({ level: enabled ? 1 : 0 });
}

export function severityColor(palette: Palette, severity: string): (text: string) => string {
  switch (severity.toLowerCase()) {
    case "critical":
    case "high":
      return palette.red;
    case "medium":
      return palette.yellow;
    case "low":
      return palette.green;
    case "info":
      return palette.cyan;
    default:
      return (text) => text;
  }
}
