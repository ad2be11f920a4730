import { describe, expect, it } from "vitest";
import { redactSecretsInStringForLog, redactUrlForLog, shortenHomePathsForLog } from "../src/log/redact";

describe("redactUrlForLog", () => {
  it("не падает на пустой строке", () => {
    expect(redactUrlForLog("")).toBe("");
  });

  it("маскирует чувствительные query-параметры", () => {
    expect(redactUrlForLog("ws://127.0.0.1:47613/recorder?token=abc123&x=1")).toBe("ws://127.0.0.1:47613/recorder?token=***&x=1");
    expect(redactUrlForLog("https://example.com/a?API_KEY=k&access_token=z")).toBe("https://example.com/a?API_KEY=***&access_token=***");
  });

  it("fallback для относительного URL", () => {
    expect(redactUrlForLog("/x?password=abc&x=1")).toBe("/x?password=***&x=1");
  });
});

describe("redactSecretsInStringForLog", () => {
  it("не падает на пустой строке", () => {
    expect(redactSecretsInStringForLog("")).toBe("");
  });

  it("маскирует key=value и key: value", () => {
    expect(redactSecretsInStringForLog("error: token=abc password: qwerty")).toBe("error: token=*** password=***");
  });

  it("маскирует параметры URL внутри строки", () => {
    expect(redactSecretsInStringForLog("fetch url=https://example.com/?secret=abc&x=1")).toBe("fetch url=https://example.com/?secret=***&x=1");
  });

  it("не трогает обычный текст", () => {
    expect(redactSecretsInStringForLog("stealth-20240305_143007.m4a saved")).toBe("stealth-20240305_143007.m4a saved");
  });
});

describe("shortenHomePathsForLog", () => {
  it("заменяет домашнюю папку на ~", () => {
    expect(shortenHomePathsForLog("/home/tester/Documents/a.m4a", "/home/tester")).toBe("~/Documents/a.m4a");
    expect(shortenHomePathsForLog("/home/tester/a /home/tester/b", "/home/tester/")).toBe("~/a ~/b");
  });

  it("пустой home, корень или чужой путь, без изменений", () => {
    expect(shortenHomePathsForLog("/home/tester/a", "")).toBe("/home/tester/a");
    expect(shortenHomePathsForLog("/etc/x", "/")).toBe("/etc/x");
    expect(shortenHomePathsForLog("/srv/a", "/home/tester")).toBe("/srv/a");
  });
});
