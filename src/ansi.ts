export const GREEN = "\x1b[32m";
export const RED = "\x1b[31m";
export const RESET = "\x1b[0m";

export function paint(color: string, text: string): string {
  return `${color}${text}${RESET}`;
}

export function stripAnsi(text: string): string {
  return text.replace(/\x1b\[[0-9;]*m/g, "");
}
