/**
 * Политика: какие файлы в папке записей считаются записями.
 *
 * Сравнение расширения без учёта регистра: файлы могли прийти из файлового менеджера как `.M4A`.
 */
import { RECORDING_FILE_EXT } from "./recordingFileNaming";

export function fileExtension(name: string): string {
  const s = String(name ?? "");
  const dot = s.lastIndexOf(".");
  if (dot <= 0 || dot === s.length - 1) return "";
  return s.slice(dot + 1).toLowerCase();
}

export function isRecordingFile(name: string): boolean {
  return fileExtension(name) === RECORDING_FILE_EXT;
}
