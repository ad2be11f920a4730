/**
 * Policy: план входов ffmpeg для захвата микрофона на текущей платформе.
 *
 * Пробуем кандидатов по порядку; первый, на котором ffmpeg не упал сразу, становится входом сессии.
 */
import { buildPulseMicCandidates } from "./pactl";

export type CaptureInputFormat = "pulse" | "avfoundation" | "dshow";

export type CaptureInput = { format: CaptureInputFormat; device: string };

export type CapturePlatform = "linux" | "darwin" | "win32";

export function capturePlatformOf(platform: string): CapturePlatform | null {
  return platform === "linux" || platform === "darwin" || platform === "win32" ? platform : null;
}

function formatFor(platform: CapturePlatform): CaptureInputFormat {
  if (platform === "darwin") return "avfoundation";
  if (platform === "win32") return "dshow";
  return "pulse";
}

/** Имя устройства в синтаксисе конкретного demuxer'а ffmpeg. */
function deviceFor(format: CaptureInputFormat, device: string): string {
  const d = String(device ?? "").trim();
  if (format === "avfoundation") return d.startsWith(":") ? d : `:${d}`;
  if (format === "dshow") return d.startsWith("audio=") ? d : `audio=${d}`;
  return d;
}

export function buildCaptureInputCandidates(params: {
  platform: CapturePlatform;
  /** Из настроек; `auto` = авто-детект. */
  inputDevice: string;
  /** `Default Source` из `pactl info` (только linux). */
  pulseDefaultSource?: string;
}): CaptureInput[] {
  const format = formatFor(params.platform);
  const configured = String(params.inputDevice ?? "").trim();
  if (configured && configured.toLowerCase() !== "auto") {
    return [{ format, device: deviceFor(format, configured) }];
  }

  if (params.platform === "darwin") return [{ format, device: ":0" }, { format, device: ":default" }];
  // У dshow нет алиаса "устройство по умолчанию": без явного inputDevice записывать нечем.
  if (params.platform === "win32") return [];
  return buildPulseMicCandidates({ defaultSourceFromInfo: params.pulseDefaultSource }).map((device) => ({ format, device }));
}
