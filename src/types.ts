/** Часовой пояс, в котором рендерится метка времени в имени файла записи. */
export type FileNameTimeZone = "local" | "utc";

/** Настройки записи. */
export interface RecordingSettings {
  /** Папка, куда сохраняются `.m4a` файлы. */
  recordingsDir: string;
  /** Путь/имя бинарника ffmpeg. */
  ffmpegPath: string;
  /** Устройство ввода (`auto` = авто-детект по платформе). */
  inputDevice: string;
  fileNameTimeZone: FileNameTimeZone;
}

/** Настройки канала управления демоном (локальный WebSocket). */
export interface ControlSettings {
  host: string;
  port: number;
  path: string;
  /** Сколько клиент ждёт ответ демона. */
  requestTimeoutMs: number;
}

export interface RecorderSettings {
  debug: {
    /** Дублировать записи лога в stderr демона. */
    enabled: boolean;
  };
  recording: RecordingSettings;
  control: ControlSettings;
  log: {
    maxEntries: number;
    retentionDays: number;
  };
}

/** Сохранённый файл записи (то, что видит UI). */
export interface RecordingFileInfo {
  name: string;
  path: string;
  /** Размер в байтах. */
  size: number;
  /** Дата создания, ISO-8601. */
  date: string;
}

/** Снимок состояния записи для UI. */
export type RecorderStatus = { active: true; fileName: string } | { active: false; fileName: null };

/** Узкий логгер, который получают компоненты (обычно `LogService.scoped()`). */
export type Logger = {
  info: (message: string, data?: Record<string, unknown>) => void;
  warn: (message: string, data?: Record<string, unknown>) => void;
  error: (message: string, data?: Record<string, unknown>) => void;
};
