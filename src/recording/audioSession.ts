import type { Logger, RecordingSettings } from "../types";
import type { AudioRoute, AudioSessionPort } from "../application/recording/recordingSessionUseCase";
import { buildCaptureInputCandidates, capturePlatformOf } from "../domain/policies/captureInput";
import { trimForLogPolicy } from "../domain/policies/logText";
import { parsePactlDefaultSourceFromInfo } from "../domain/policies/pactl";
import { ok, type Result } from "../shared/result";
import { commandExists, execText, type ExecTextResult } from "../os/commandExists";

export type AudioSessionDeps = {
  getSettings: () => RecordingSettings;
  log: Logger;
  platform?: string;
  commandExists?: (cmd: string) => Promise<boolean>;
  execText?: (file: string, args: string[]) => Promise<ExecTextResult>;
};

/**
 * Маршрутизация звука для записи: проверяет ffmpeg и выбирает входы захвата для платформы.
 *
 * `configure()` кэширует маршрут на время сессии, `deactivate()` его сбрасывает.
 */
export class FfmpegAudioSession implements AudioSessionPort {
  private route: AudioRoute | null = null;

  constructor(private readonly deps: AudioSessionDeps) {}

  async configure(): Promise<AudioRoute> {
    const settings = this.deps.getSettings();
    const platformRaw = this.deps.platform ?? process.platform;
    const platform = capturePlatformOf(platformRaw);
    if (!platform) throw new Error(`платформа не поддерживается: ${platformRaw}`);

    const exists = this.deps.commandExists ?? commandExists;
    if (!(await exists(settings.ffmpegPath))) {
      throw new Error(`не найден ffmpeg (${settings.ffmpegPath}), установите ffmpeg или укажите recording.ffmpegPath`);
    }

    const pulseDefaultSource = platform === "linux" ? await this.readPulseDefaultSource(exists) : undefined;
    const inputs = buildCaptureInputCandidates({ platform, inputDevice: settings.inputDevice, pulseDefaultSource });
    if (inputs.length === 0) {
      throw new Error("нет входа для захвата звука (укажите recording.inputDevice)");
    }

    this.route = { inputs };
    this.deps.log.info("аудио-сессия настроена", { platform, inputs: inputs.map((i) => `${i.format}:${i.device}`) });
    return this.route;
  }

  async deactivate(): Promise<Result<void>> {
    // Маршрут держит только выбранные входы: освобождать в ОС нечего, ошибок здесь не бывает.
    if (!this.route) return ok(undefined);
    this.route = null;
    this.deps.log.info("аудио-сессия деактивирована");
    return ok(undefined);
  }

  private async readPulseDefaultSource(exists: (cmd: string) => Promise<boolean>): Promise<string | undefined> {
    if (!(await exists("pactl"))) return undefined;
    const run = this.deps.execText ?? execText;
    const info = await run("pactl", ["info"]);
    this.deps.log.info("pactl info", { ok: info.ok, stdout: trimForLogPolicy(info.stdout, 900), stderr: trimForLogPolicy(info.stderr, 300) });
    if (!info.ok) return undefined;
    return parsePactlDefaultSourceFromInfo(info.stdout) || undefined;
  }
}
