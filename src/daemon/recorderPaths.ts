import * as os from "node:os";
import * as path from "node:path";

import type { RecorderSettings } from "../types";

export type RecorderPaths = {
  /** `$STEALTH_RECORDER_HOME` или `~/.config/stealth-recorder`. */
  configDir: string;
  settingsFilePath: string;
  logsDirPath: string;
  /** Куда пишем записи, если `recording.recordingsDir` не задан. */
  defaultRecordingsDir: string;
  homeDir: string;
};

export function resolveRecorderPaths(params?: { env?: NodeJS.ProcessEnv; homeDir?: string }): RecorderPaths {
  const env = params?.env ?? process.env;
  const homeDir = params?.homeDir ?? os.homedir();
  const fromEnv = String(env.STEALTH_RECORDER_HOME ?? "").trim();
  const configDir = fromEnv ? path.resolve(expandHome(fromEnv, homeDir)) : path.join(homeDir, ".config", "stealth-recorder");
  return {
    configDir,
    settingsFilePath: path.join(configDir, "settings.json"),
    logsDirPath: path.join(configDir, "logs"),
    defaultRecordingsDir: path.join(homeDir, "Documents", "StealthRecorder"),
    homeDir,
  };
}

/** Папка записей с учётом настроек: пусто → по умолчанию, `~/…` раскрывается. */
export function resolveRecordingsDir(settings: RecorderSettings, paths: RecorderPaths): string {
  const raw = settings.recording.recordingsDir.trim();
  if (!raw) return paths.defaultRecordingsDir;
  return path.resolve(expandHome(raw, paths.homeDir));
}

function expandHome(p: string, homeDir: string): string {
  if (p === "~") return homeDir;
  if (p.startsWith("~/")) return path.join(homeDir, p.slice(2));
  return p;
}
