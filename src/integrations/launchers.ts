import { existsSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { commandExists, launchDetached } from "./process.js";
import type { ToolIntegration } from "./types.js";

interface EditorSpec {
  name: string;
  displayName: string;
  icon: string;
  command: string;
  /** macOS application bundle used when the command is not on PATH */
  macApp?: string;
}

/** Editors driven by a `<command> <folder> [file]` CLI. */
export function editorIntegration(spec: EditorSpec): ToolIntegration {
  const appPaths = spec.macApp
    ? [join("/Applications", `${spec.macApp}.app`), join(homedir(), "Applications", `${spec.macApp}.app`)]
    : [];
  const useMacApp = () => process.platform === "darwin" && appPaths.some((p) => existsSync(p));

  const open = (args: string[]): Promise<boolean> => {
    if (commandExists(spec.command)) return launchDetached(spec.command, args);
    if (spec.macApp && useMacApp()) return launchDetached("open", ["-a", spec.macApp, ...args]);
    return Promise.resolve(false);
  };

  return {
    name: spec.name,
    displayName: spec.displayName,
    icon: spec.icon,
    isAvailable: () => commandExists(spec.command) || useMacApp(),
    launch: (path) => open([path]),
    launchFile: (path, file) => open([path, file]),
  };
}

const LINUX_TERMINALS: Array<{ command: string; args: (path: string) => string[] }> = [
  { command: "x-terminal-emulator", args: () => [] },
  { command: "gnome-terminal", args: (path) => [`--working-directory=${path}`] },
  { command: "konsole", args: (path) => ["--workdir", path] },
  { command: "xfce4-terminal", args: (path) => [`--working-directory=${path}`] },
  { command: "xterm", args: () => [] },
];

export function terminalIntegration(): ToolIntegration {
  return {
    name: "terminal",
    displayName: "Terminal",
    icon: "⌨️",
    isAvailable: () =>
      process.platform === "darwin" ||
      process.platform === "win32" ||
      LINUX_TERMINALS.some((t) => commandExists(t.command)),
    launch: (path) => {
      if (process.platform === "darwin") return launchDetached("open", ["-a", "Terminal", path]);
      if (process.platform === "win32") {
        if (commandExists("wt")) return launchDetached("wt", ["-d", path]);
        return launchDetached("cmd", ["/c", "start", "cmd", "/K"], path);
      }
      const terminal = LINUX_TERMINALS.find((t) => commandExists(t.command));
      if (!terminal) return Promise.resolve(false);
      // terminals without a directory flag inherit the working directory
      return launchDetached(terminal.command, terminal.args(path), path);
    },
  };
}
