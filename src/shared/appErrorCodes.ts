/**
 * Единый набор кодов ошибок приложения (AppErrorDto.code).
 *
 * Зачем:
 * - не плодить “магические строки” по проекту;
 * - иметь стабильные коды для тестов, CLI и протокола управления.
 */
export const APP_ERROR = {
  VALIDATION: "E_VALIDATION",
  NOT_FOUND: "E_NOT_FOUND",
  TIMEOUT: "E_TIMEOUT",
  INTERNAL: "E_INTERNAL",

  SETTINGS: "E_SETTINGS",
  FS_IO: "E_FS_IO",

  RECORDING_CONFIG: "E_RECORDING_CONFIG",
  RECORDING_BACKEND: "E_RECORDING_BACKEND",

  DAEMON_UNAVAILABLE: "E_DAEMON_UNAVAILABLE",
} as const;

export type AppErrorCode = (typeof APP_ERROR)[keyof typeof APP_ERROR];
