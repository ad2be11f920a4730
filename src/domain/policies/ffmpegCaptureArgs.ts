/**
 * Policy: сборка аргументов ffmpeg для записи в `.m4a`.
 *
 * Параметры кодирования фиксированные: моно, 44.1 kHz, AAC высокого качества.
 * Чистая функция: только формирует args.
 */
import type { CaptureInput } from "./captureInput";

export const CAPTURE_ENCODING = {
  channels: 1,
  sampleRateHz: 44_100,
  codec: "aac",
  bitrate: "128k",
} as const;

export function ffmpegCaptureArgsPolicy(params: { input: CaptureInput; outPath: string }): string[] {
  const outPath = String(params.outPath ?? "").trim();
  const args = ["-hide_banner", "-nostats", "-loglevel", "error"];
  // буфер на входе, чтобы аудио-сервер не дропал сэмплы при кратких пиках нагрузки
  args.push("-thread_queue_size", "1024", "-f", params.input.format, "-i", params.input.device);
  args.push(
    "-vn",
    "-ac",
    String(CAPTURE_ENCODING.channels),
    "-ar",
    String(CAPTURE_ENCODING.sampleRateHz),
    "-c:a",
    CAPTURE_ENCODING.codec,
    "-b:a",
    CAPTURE_ENCODING.bitrate,
  );
  // moov-атом в начало: файл читается плеерами сразу после остановки.
  args.push("-movflags", "+faststart", "-f", "ipod", "-y", outPath);
  return args;
}
