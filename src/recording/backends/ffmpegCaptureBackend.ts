import { spawn, type ChildProcess } from "node:child_process";

import type { Logger } from "../../types";
import type { AudioRoute, CaptureBackend, CaptureHandle } from "../../application/recording/recordingSessionUseCase";
import type { CaptureInput } from "../../domain/policies/captureInput";
import { ffmpegCaptureArgsPolicy } from "../../domain/policies/ffmpegCaptureArgs";
import { appendRollingText, trimForLogPolicy } from "../../domain/policies/logText";

/** Окно, в которое ffmpeg с невалидным входом успевает упасть. */
const QUICK_EXIT_WINDOW_MS = 300;
const STOP_GRACE_MS = 8000;
const KILL_GRACE_MS = 2000;

async function waitMs(ms: number): Promise<void> {
  return await new Promise((resolve) => setTimeout(resolve, ms));
}

class FfmpegCaptureHandle implements CaptureHandle {
  private running = true;
  private stopRequestedAtMs = 0;
  private readonly exited: Promise<void>;

  constructor(
    readonly fileName: string,
    readonly filePath: string,
    private readonly proc: ChildProcess,
    private readonly input: CaptureInput,
    private readonly stderrTail: () => string,
    private readonly log: Logger,
  ) {
    this.exited = new Promise<void>((resolve) => {
      proc.once("exit", (code: number | null, signal: NodeJS.Signals | null) => {
        this.running = false;
        const payload = { fileName, code, signal, stderrTail: trimForLogPolicy(this.stderrTail(), 1600) };
        if (this.stopRequestedAtMs > 0) this.log.info("ffmpeg exit (stop)", payload);
        else this.log.warn("ffmpeg завершился во время записи", payload);
        resolve();
      });
    });
  }

  isRunning(): boolean {
    return this.running;
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.stopRequestedAtMs = Date.now();

    // `q` в stdin: ffmpeg дописывает moov-атом и корректно закрывает контейнер.
    try {
      if (this.proc.stdin && !this.proc.stdin.destroyed) {
        this.proc.stdin.write("q");
        this.proc.stdin.end();
      }
    } catch (e) {
      this.log.warn("не удалось отправить 'q' в stdin ffmpeg", { error: String(e ?? "") });
    }

    try {
      this.proc.kill("SIGINT");
    } catch (e) {
      this.log.warn("не удалось послать SIGINT ffmpeg", { error: String(e ?? "") });
    }

    await Promise.race([this.exited, waitMs(STOP_GRACE_MS)]);
    if (this.running) {
      this.log.warn("ffmpeg не завершился после SIGINT, SIGKILL", { fileName: this.fileName, input: this.input.device });
      try {
        this.proc.kill("SIGKILL");
      } catch (e) {
        this.log.warn("не удалось послать SIGKILL ffmpeg", { error: String(e ?? "") });
      }
      await Promise.race([this.exited, waitMs(KILL_GRACE_MS)]);
    }
    if (this.running) throw new Error(`ffmpeg не завершился: ${this.fileName}`);
  }
}

/**
 * Захват микрофона через ffmpeg в дочернем процессе.
 *
 * Кандидаты входа из `AudioRoute` пробуются по очереди: процесс, который упал в первые 300 мс,
 * считается невалидным источником.
 */
export class FfmpegCaptureBackend implements CaptureBackend {
  constructor(private readonly params: { ffmpegPath: () => string; log: Logger }) {}

  async open(params: { fileName: string; filePath: string; route: AudioRoute }): Promise<CaptureHandle> {
    const { fileName, filePath, route } = params;
    if (route.inputs.length === 0) throw new Error("нет входа для захвата звука (укажите recording.inputDevice)");

    let lastTail = "";
    for (const input of route.inputs) {
      const attempt = await this.trySpawn(input, fileName, filePath);
      if (attempt.kind === "running") {
        this.params.log.info("запись стартовала", { fileName, format: input.format, device: input.device });
        return attempt.handle;
      }
      lastTail = attempt.stderrTail;
    }

    this.params.log.error("не удалось стартовать ffmpeg ни с одним входом", {
      inputs: route.inputs.map((i) => `${i.format}:${i.device}`),
      stderrTail: trimForLogPolicy(lastTail, 1600),
    });
    throw new Error(`ffmpeg не стартовал: ${trimForLogPolicy(lastTail.trim(), 600) || "нет вывода"}`);
  }

  private async trySpawn(
    input: CaptureInput,
    fileName: string,
    filePath: string,
  ): Promise<{ kind: "running"; handle: CaptureHandle } | { kind: "failed"; stderrTail: string }> {
    const args = ffmpegCaptureArgsPolicy({ input, outPath: filePath });
    const ffmpeg = this.params.ffmpegPath();
    this.params.log.info("ffmpeg spawn", { ffmpeg, format: input.format, device: input.device, args: args.join(" ") });

    let stderrTail = "";
    const proc = spawn(ffmpeg, args, { stdio: ["pipe", "ignore", "pipe"], windowsHide: true });
    proc.stderr?.on("data", (buf: Buffer) => {
      stderrTail = appendRollingText({ prev: stderrTail, chunk: String(buf ?? ""), maxChars: 2000 });
    });
    proc.on("error", (e: Error) => {
      stderrTail = appendRollingText({ prev: stderrTail, chunk: `${e.message}\n`, maxChars: 2000 });
      this.params.log.warn("ошибка процесса ffmpeg", { ffmpeg, error: e.message });
    });

    const exitedQuickly = await Promise.race([
      new Promise<boolean>((resolve) => {
        proc.once("exit", () => resolve(true));
        proc.once("error", () => resolve(true));
      }),
      waitMs(QUICK_EXIT_WINDOW_MS).then(() => false),
    ]);

    if (exitedQuickly || proc.exitCode !== null) {
      this.params.log.warn("ffmpeg упал сразу (невалидный источник?)", {
        format: input.format,
        device: input.device,
        stderrTail: trimForLogPolicy(stderrTail, 1200),
      });
      try {
        proc.kill("SIGKILL");
      } catch (e) {
        this.params.log.warn("не удалось прибить ffmpeg (SIGKILL) после быстрого exit", { error: String(e ?? "") });
      }
      return { kind: "failed", stderrTail };
    }

    const handle = new FfmpegCaptureHandle(fileName, filePath, proc, input, () => stderrTail, this.params.log);
    return { kind: "running", handle };
  }
}
