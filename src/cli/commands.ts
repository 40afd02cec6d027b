export type Command = "on" | "off" | "toggle" | "state";

const ALIASES: Readonly<Record<string, Command>> = {
  "0": "off",
  off: "off",
  "1": "on",
  on: "on",
  t: "toggle",
  toggle: "toggle",
  s: "state",
  state: "state",
  status: "state",
};

export const COMMAND_CHOICES = Object.keys(ALIASES);
export const DEFAULT_COMMAND = "s";

export function parseCommand(token: string): Command | null {
  const key = token.trim().toLowerCase();
  return Object.prototype.hasOwnProperty.call(ALIASES, key) ? ALIASES[key] : null;
}
