import assert from "node:assert/strict";
import test from "node:test";
import { createLogger } from "./logger.js";

test("logger writes one JSON line per entry with meta merged", () => {
  const lines: string[] = [];
  const log = createLogger({ write: (line) => lines.push(line), now: () => 42 });

  log.info("position_transition", { from: "FLAT", to: "OPEN" });

  assert.deepEqual(lines, ['{"level":"info","msg":"position_transition","time":42,"from":"FLAT","to":"OPEN"}']);
});

test("entries below the minimum level are dropped", () => {
  const lines: string[] = [];
  const log = createLogger({ level: "warn", write: (line) => lines.push(line), now: () => 1 });

  log.debug("noise");
  log.info("noise");
  log.warn("bitget request failed");
  log.error("boom");

  assert.deepEqual(
    lines.map((line) => JSON.parse(line).level),
    ["warn", "error"]
  );
});
