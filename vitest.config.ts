import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    setupFiles: ["reflect-metadata"],
    include: ["tests/**/*.test.ts"],
    clearMocks: true,
    restoreMocks: true,
    coverage: {
      provider: "v8",
      reporter: ["text", "html"],
      // Покрытие считаем для модулей без реального ffmpeg/сокетов: CLI-обвязку и main.ts не включаем.
      include: [
        "src/application/**/*.ts",
        "src/domain/**/*.ts",
        "src/log/**/*.ts",
        "src/shared/**/*.ts",
        "src/control/controlActionRouter.ts",
        "src/recording/recordingsRepository.ts",
        "src/presentation/cli/**/*.ts",
        "src/settingsStore.ts",
        "src/daemon/recorderPaths.ts",
      ],
      exclude: ["tests/**"],
      thresholds: {
        lines: 60,
        statements: 60,
        functions: 50,
        branches: 25,
      },
    },
  },
});
