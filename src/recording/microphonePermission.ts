import type { Logger, RecordingSettings } from "../types";
import type { MicrophonePermissionPort } from "../application/recording/recordingSessionUseCase";
import { parseInputSourcesFromListShortSources } from "../domain/policies/pactl";
import { trimForLogPolicy } from "../domain/policies/logText";
import { commandExists, execText, type ExecTextResult } from "../os/commandExists";

/**
 * Доступ к микрофону.
 *
 * Linux: нужен ffmpeg и хотя бы один не-monitor источник в `pactl list short sources`
 * (без pactl считаем, что есть ALSA `default`). macOS/Windows: достаточно ffmpeg, системный
 * запрос разрешения ОС покажет при первом захвате.
 */
export class MicrophonePermission implements MicrophonePermissionPort {
  constructor(
    private readonly deps: {
      getSettings: () => RecordingSettings;
      log: Logger;
      platform?: string;
      commandExists?: (cmd: string) => Promise<boolean>;
      execText?: (file: string, args: string[]) => Promise<ExecTextResult>;
    },
  ) {}

  async request(): Promise<boolean> {
    const exists = this.deps.commandExists ?? commandExists;
    const ffmpegPath = this.deps.getSettings().ffmpegPath;
    if (!(await exists(ffmpegPath))) {
      this.deps.log.warn("микрофон недоступен: не найден ffmpeg", { ffmpegPath });
      return false;
    }

    const platform = this.deps.platform ?? process.platform;
    if (platform !== "linux") return true;
    if (!(await exists("pactl"))) return true;

    const run = this.deps.execText ?? execText;
    const res = await run("pactl", ["list", "short", "sources"]);
    if (!res.ok) {
      this.deps.log.warn("pactl list short sources завершился с ошибкой", { stderr: trimForLogPolicy(res.stderr, 400) });
      return false;
    }
    const sources = parseInputSourcesFromListShortSources(res.stdout);
    this.deps.log.info("источники микрофона", { sources: sources.slice(0, 20) });
    return sources.length > 0;
  }
}
