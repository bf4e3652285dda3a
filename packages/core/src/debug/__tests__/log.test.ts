import { assert, describe, test } from "@sketchpad/testkit";
import { emitAudit, isAuditEnabled, setAuditEnabled, setLogSink, warnDev } from "../log.js";

function capture(): { warnings: string[]; audits: string[] } {
  const warnings: string[] = [];
  const audits: string[] = [];
  setLogSink({
    warn: (message) => {
      warnings.push(message);
    },
    audit: (line) => {
      audits.push(line);
    },
  });
  return { warnings, audits };
}

describe("debug/log", () => {
  test("warnDev reports each key once", () => {
    const { warnings } = capture();
    warnDev("k1", "first");
    warnDev("k1", "again");
    warnDev("k2", "second");
    assert.deepEqual(warnings, ["[sketchpad] first", "[sketchpad] second"]);
    setLogSink(null);
  });

  test("emitAudit writes nothing unless enabled", () => {
    const { audits } = capture();
    const before = isAuditEnabled();
    setAuditEnabled(false);
    emitAudit("clock", "start");
    assert.deepEqual(audits, []);
    setAuditEnabled(before);
    setLogSink(null);
  });

  test("audit records are one JSON object per line", () => {
    const { audits } = capture();
    const before = isAuditEnabled();
    setAuditEnabled(true);
    emitAudit("screen", "update", { turtles: 2 });
    setAuditEnabled(before);
    setLogSink(null);
    assert.equal(audits.length, 1);
    const parsed: unknown = JSON.parse(audits[0] ?? "");
    assert.ok(typeof parsed === "object" && parsed !== null);
    assert.equal(Reflect.get(parsed, "scope"), "screen");
    assert.equal(Reflect.get(parsed, "stage"), "update");
    assert.equal(Reflect.get(parsed, "turtles"), 2);
    assert.equal(typeof Reflect.get(parsed, "ts"), "string");
  });

  test("a throwing sink never reaches the caller", () => {
    setLogSink({
      warn: () => {
        throw new Error("sink down");
      },
      audit: () => {
        throw new Error("sink down");
      },
    });
    const before = isAuditEnabled();
    setAuditEnabled(true);
    assert.doesNotThrow(() => warnDev("throwing-sink", "x"));
    assert.doesNotThrow(() => emitAudit("clock", "stop"));
    setAuditEnabled(before);
    setLogSink(null);
  });
});
