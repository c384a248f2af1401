import test from "node:test";
import assert from "node:assert/strict";
import { detectTerminalCapabilities } from "../src/ui/capabilities.js";
import { createTheme } from "../src/ui/theme.js";

test("detectTerminalCapabilities disables color and animation off a terminal", () => {
  const caps = detectTerminalCapabilities({ isTTY: false, env: {}, platform: "linux" });

  assert.equal(caps.supportsColor, false);
  assert.equal(caps.animations, false);
  assert.equal(caps.theme, "mono");
  assert.equal(caps.supportsUnicode, true);
});

test("detectTerminalCapabilities honours NO_COLOR and --no-color", () => {
  assert.equal(detectTerminalCapabilities({ isTTY: true, env: {} }).supportsColor, true);
  assert.equal(detectTerminalCapabilities({ isTTY: true, env: { NO_COLOR: "1" } }).supportsColor, false);
  assert.equal(
    detectTerminalCapabilities({ isTTY: true, env: {}, supportsColor: true, color: false }).supportsColor,
    false,
  );
});

test("detectTerminalCapabilities reads IMPORTLENS_THEME", () => {
  const mono = detectTerminalCapabilities({ isTTY: true, supportsColor: true, env: { IMPORTLENS_THEME: "MONO" } });
  const color = detectTerminalCapabilities({ isTTY: true, supportsColor: true, env: {} });

  assert.equal(mono.theme, "mono");
  assert.equal(color.theme, "color");
});

test("detectTerminalCapabilities falls back to ASCII on plain Windows consoles", () => {
  const caps = detectTerminalCapabilities({ isTTY: true, env: {}, platform: "win32" });
  assert.equal(caps.supportsUnicode, false);

  const theme = createTheme(caps);
  assert.equal(theme.symbols.tick, "[ok]");
  assert.equal(theme.symbols.warn, "[!]");
});

test("mono theme leaves text untouched", () => {
  const theme = createTheme(detectTerminalCapabilities({ isTTY: false, env: {} }));
  assert.equal(theme.colors.heading("pkg"), "pkg");
  assert.equal(theme.colors.err("boom"), "boom");
});
