import { describe, expect, it, vi } from "vitest";
import { MicrophonePermission } from "../../src/recording/microphonePermission";
import { DEFAULT_SETTINGS } from "../../src/settingsStore";
import { makeLog } from "../stubs/recordingFakes";

function setup(params: { platform: string; tools?: string[]; sources?: { ok: boolean; stdout: string } }) {
  const tools = new Set(params.tools ?? ["ffmpeg", "pactl"]);
  const execText = vi.fn(async () => ({ ok: params.sources?.ok ?? true, stdout: params.sources?.stdout ?? "", stderr: "" }));
  const permission = new MicrophonePermission({
    getSettings: () => DEFAULT_SETTINGS.recording,
    log: makeLog(),
    platform: params.platform,
    commandExists: async (cmd) => tools.has(cmd),
    execText,
  });
  return { permission, execText };
}

describe("MicrophonePermission", () => {
  it("без ffmpeg доступа нет", async () => {
    expect(await setup({ platform: "darwin", tools: [] }).permission.request()).toBe(false);
  });

  it("macOS/Windows: достаточно ffmpeg", async () => {
    expect(await setup({ platform: "darwin" }).permission.request()).toBe(true);
    expect(await setup({ platform: "win32" }).permission.request()).toBe(true);
  });

  it("linux: есть не-monitor источник → true", async () => {
    const { permission, execText } = setup({
      platform: "linux",
      sources: { ok: true, stdout: "1\tout.monitor\tmodule\tIDLE\n2\tmicA\tmodule\tRUNNING\n" },
    });
    expect(await permission.request()).toBe(true);
    expect(execText).toHaveBeenCalledWith("pactl", ["list", "short", "sources"]);
  });

  it("linux: только monitor-источники → false", async () => {
    const { permission } = setup({ platform: "linux", sources: { ok: true, stdout: "1\tout.monitor\tmodule\tIDLE\n" } });
    expect(await permission.request()).toBe(false);
  });

  it("linux: pactl упал → false, pactl нет → true (ALSA default)", async () => {
    expect(await setup({ platform: "linux", sources: { ok: false, stdout: "" } }).permission.request()).toBe(false);
    expect(await setup({ platform: "linux", tools: ["ffmpeg"] }).permission.request()).toBe(true);
  });
});
