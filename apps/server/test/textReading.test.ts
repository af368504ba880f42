import test from "node:test";
import assert from "node:assert/strict";
import { ResultCache, zeroRecord } from "../src/services/resultCache.js";
import { loadRuleSets } from "../src/services/rules/ruleSetLoader.js";
import {
  isEligibleForTextReading,
  parseTextReadingOutput,
  selectCropRegion,
  TextReadingService
} from "../src/services/textReadingService.js";
import { FakeVlmService, makeTempDir, writeTestImage } from "./helpers.js";

const { textReading: rules } = await loadRuleSets();

test("parseTextReadingOutput reads the last line", () => {
  assert.deepEqual(parseTextReadingOutput("The display shows six digits.\n\n123456 - flagged\n"), {
    digit: "123456",
    flagged: true
  });
  assert.deepEqual(parseTextReadingOutput("HSCODE 9876 - None"), { digit: "9876", flagged: false });
  assert.deepEqual(parseTextReadingOutput("I cannot read this image."), { digit: "", flagged: false });
  assert.deepEqual(parseTextReadingOutput(""), { digit: "", flagged: false });
});

test("parseTextReadingOutput drops a bare HSCODE token and splits on the first separator", () => {
  assert.deepEqual(parseTextReadingOutput("HSCODE - Flagged"), { digit: "", flagged: true });
  assert.deepEqual(parseTextReadingOutput("12 - 34 - flagged"), { digit: "12", flagged: true });
});

test("eligibility follows the per-label thresholds", () => {
  const record = (fields: Partial<ReturnType<typeof zeroRecord>>) => ({ ...zeroRecord("x"), ...fields });

  assert.equal(isEligibleForTextReading(record({ locationLabels: [{ name: "LCD_SCREEN_1", confidence: 60 }] }), rules), true);
  assert.equal(isEligibleForTextReading(record({ locationLabels: [{ name: "LCD_SCREEN_1", confidence: 59 }] }), rules), false);
  assert.equal(isEligibleForTextReading(record({ materialLabels: [{ name: "sign", confidence: 55 }] }), rules), true);
  assert.equal(isEligibleForTextReading(record({ materialLabels: [{ name: "sign", confidence: 54.9 }] }), rules), false);
  assert.equal(isEligibleForTextReading(record({ materialLabels: [{ name: "radiometer", confidence: 50 }] }), rules), true);
  assert.equal(isEligibleForTextReading(record({ materialLabels: [{ name: "LCD_SCREEN_0", confidence: 90 }] }), rules), false);
  assert.equal(isEligibleForTextReading(record({}), rules), false);
});

test("a small display box is widened to the minimum crop size", () => {
  const region = selectCropRegion(
    [{ name: "LCD_SCREEN_0", confidence: 80, geometry: { left: 0.5, top: 0.25, width: 0.125, height: 0.125 } }],
    200,
    160,
    rules
  );
  assert.deepEqual(region, { left: 83, top: 35, width: 59, height: 30 });
});

test("a widened crop is clamped to the image", () => {
  const region = selectCropRegion(
    [{ name: "LCD_SCREEN_0_MAIN", confidence: 80, geometry: { left: 0, top: 0, width: 0.125, height: 0.125 } }],
    200,
    160,
    rules
  );
  assert.deepEqual(region, { left: 0, top: 0, width: 42, height: 25 });
});

test("the most confident display box above the floor is cropped", () => {
  const labels = [
    { name: "LCD_SCREEN_0", confidence: 70, geometry: { left: 0, top: 0, width: 0.5, height: 0.5 } },
    { name: "LCD_SCREEN_0_MAIN", confidence: 85, geometry: { left: 0.25, top: 0.25, width: 0.5, height: 0.5 } },
    { name: "LCD_SCREEN_1", confidence: 99, geometry: { left: 0, top: 0, width: 1, height: 1 } }
  ];
  assert.deepEqual(selectCropRegion(labels, 200, 160, rules), { left: 50, top: 40, width: 100, height: 80 });
});

test("no usable display box means the full image is read", () => {
  const box = { left: 0.25, top: 0.25, width: 0.5, height: 0.5 };
  assert.equal(selectCropRegion([{ name: "LCD_SCREEN_0", confidence: 60, geometry: box }], 200, 160, rules), null);
  assert.equal(selectCropRegion([{ name: "LCD_SCREEN_0", confidence: 90 }], 200, 160, rules), null);
  assert.equal(selectCropRegion([], 200, 160, rules), null);
});

test("run reads eligible images once and isolates failures", async (t) => {
  const input = await makeTempDir(t);
  const output = await makeTempDir(t);
  const cache = new ResultCache(output);

  await writeTestImage(input, "meter.jpg", 200, 160);
  await cache.write("meter", {
    locationLabels: [{ name: "LCD_SCREEN_0", confidence: 90, geometry: { left: 0.5, top: 0.25, width: 0.25, height: 0.5 } }],
    locationClass: "unknown_device"
  });
  await writeTestImage(input, "broken.jpg", 77);
  await cache.write("broken", { materialLabels: [{ name: "sign", confidence: 80 }], materialClass: "OCC - unpacking" });
  await cache.write("done", {
    materialLabels: [{ name: "sign", confidence: 80 }],
    textReading: { digit: "55", flagged: false }
  });
  await cache.write("missing", { materialLabels: [{ name: "sign", confidence: 80 }] });
  await writeTestImage(input, "plain.jpg", 78);
  await cache.write("plain", { locationLabels: [{ name: "6_IT_0", confidence: 90 }], locationClass: "6_IT_0" });

  const vlm = new FakeVlmService({ 60: "The panel reads 4070.\n4070 - None", 77: new Error("model not ready") });
  const service = new TextReadingService(cache, vlm, "test-vlm", "Read the digits", rules);

  const messages: string[] = [];
  const summary = await service.run(input, {
    observer: { onProgress: (_current, _total, message) => messages.push(message) }
  });

  assert.equal(summary.processed, 1);
  assert.equal(summary.cached, 1);
  assert.equal(summary.skipped, 2);
  assert.deepEqual(summary.failures, [{ imageId: "broken", code: "service_call_failed", message: "model not ready" }]);
  assert.deepEqual(messages, [
    "broken: service_call_failed",
    "Skipping done (already has text reading)",
    "Text reading: meter -> 4070",
    "Image not found for missing, skipping",
    "Skipping plain (no target labels)"
  ]);

  assert.deepEqual(vlm.calls, [
    { modelId: "test-vlm", prompt: "Read the digits", width: 77, height: 40 },
    { modelId: "test-vlm", prompt: "Read the digits", width: 60, height: 80 }
  ]);
  assert.deepEqual((await cache.read("meter")).textReading, { digit: "4070", flagged: false });
  assert.equal((await cache.read("broken")).textReading, null);

  await service.run(input);
  assert.equal(vlm.calls.length, 3);
  assert.equal(vlm.calls[2].width, 77);
});
