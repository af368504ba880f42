import test from "node:test";
import assert from "node:assert/strict";
import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { decideLocationClass, LocationClassifier, shouldForward } from "../src/services/locationClassifier.js";
import { ResultCache } from "../src/services/resultCache.js";
import { loadRuleSets } from "../src/services/rules/ruleSetLoader.js";
import { FakeLabelService, LOCATION_ARN, makeTempDir, writeTestImage } from "./helpers.js";

const { location: rules } = await loadRuleSets();

test("a screen with no location or device decides unknown_device", () => {
  const decision = decideLocationClass([{ name: "LCD_SCREEN_0", confidence: 92 }], rules);
  assert.equal(decision.locationClass, "unknown_device");
  assert.equal(decision.screenObserved, true);
});

test("neither a screen nor a location decides next_stage", () => {
  assert.equal(decideLocationClass([{ name: "HAND", confidence: 90 }], rules).locationClass, "next_stage");
  assert.equal(decideLocationClass([], rules).locationClass, "next_stage");
});

test("a device label wins over a location label and is canonicalised", () => {
  const decision = decideLocationClass(
    [
      { name: "6_IT_0", confidence: 97 },
      { name: "7_MOISTURE_DISPLAY", confidence: 80 }
    ],
    rules
  );
  assert.equal(decision.locationClass, "7_MOISTURE");
  assert.equal(decision.location?.name, "6_IT_0");
});

test("each location label is held to its own threshold", () => {
  const strictRules = { ...rules, thresholds: { "6_IT_0": 90, "6_BE_0": 50 } };
  const decision = decideLocationClass(
    [
      { name: "6_IT_0", confidence: 88 },
      { name: "6_BE_0", confidence: 60 }
    ],
    strictRules
  );
  assert.equal(decision.locationClass, "6_BE_0");
});

test("the strongest location is used when nothing clears its threshold", () => {
  const strictRules = { ...rules, thresholds: { "6_IT_0": 60, "6_GR_0": 60 } };
  const decision = decideLocationClass(
    [
      { name: "LCD_SCREEN_0", confidence: 90 },
      { name: "6_GR_0", confidence: 12 },
      { name: "6_IT_0", confidence: 10 }
    ],
    strictRules
  );
  assert.equal(decision.locationClass, "6_GR_0");
});

test("a floor extra redirects a location decision to the floor bucket", () => {
  const decision = decideLocationClass(
    [
      { name: "6_HR_0", confidence: 90 },
      { name: "FLOOR", confidence: 80 }
    ],
    rules
  );
  assert.equal(decision.locationClass, "floor");
  assert.equal(decision.location?.name, "6_HR_0");
  assert.deepEqual(decision.extras, ["FLOOR"]);
  assert.equal(shouldForward(decision.locationClass, rules), false);
});

test("a floor extra below its threshold still redirects when the relaxed pass runs", () => {
  const strictRules = { ...rules, thresholds: { "6_HR_0": 95, FLOOR: 90 } };
  const labels = [
    { name: "6_HR_0", confidence: 90 },
    { name: "FLOOR", confidence: 80 }
  ];
  assert.equal(decideLocationClass(labels, strictRules).locationClass, "floor");
  assert.equal(decideLocationClass(labels, { ...strictRules, thresholds: { FLOOR: 90 } }).locationClass, "6_HR_0");
});

test("a device decision is not redirected by a floor extra", () => {
  const labels = [
    { name: "RADIATION_METER", confidence: 85 },
    { name: "FLOOR", confidence: 80 }
  ];
  assert.equal(decideLocationClass(labels, rules).locationClass, "RADIATION");
});

test("a location label at zero confidence is still the best-effort answer", () => {
  assert.equal(decideLocationClass([{ name: "6_HR_0", confidence: 0 }], rules).locationClass, "6_HR_0");
});

test("only next_stage and device decisions are forwarded", () => {
  assert.equal(shouldForward("next_stage", rules), true);
  assert.equal(shouldForward("RADIATION", rules), true);
  assert.equal(shouldForward("6_IT_0", rules), false);
  assert.equal(shouldForward("unknown_device", rules), false);
  assert.equal(shouldForward(null, rules), false);
});

test("run classifies each image once and reuses cached labels afterwards", async (t) => {
  const input = await makeTempDir(t);
  const output = await makeTempDir(t);
  const paths = [
    await writeTestImage(input, "a.jpg", 41),
    await writeTestImage(input, "b.JPG", 42),
    await writeTestImage(input, "c.png", 43)
  ];
  const skipped = join(input, "notes.txt");
  await writeFile(skipped, "not an image");

  const labelService = new FakeLabelService({
    [LOCATION_ARN]: {
      41: [{ name: "6_IT_0", confidence: 95 }],
      42: [],
      43: [{ name: "RADIATION_METER", confidence: 88 }]
    }
  });
  const cache = new ResultCache(output);
  const classifier = new LocationClassifier(cache, labelService, LOCATION_ARN, rules);

  const messages: string[] = [];
  const first = await classifier.run([...paths, skipped], {
    observer: { onProgress: (_current, _total, message) => messages.push(message) }
  });

  assert.deepEqual(first.forwarded, [paths[1], paths[2]]);
  assert.deepEqual([...first.deviceHints], [["c", "RADIATION"]]);
  assert.equal(first.summary.processed, 3);
  assert.deepEqual(messages, ["Location: a -> 6_IT_0", "Location: b -> next_stage", "Location: c -> RADIATION"]);
  assert.deepEqual(
    labelService.calls.map((call) => call.minConfidence),
    [75, 75, 75]
  );
  assert.deepEqual((await cache.read("b")).locationLabels, []);

  const second = await classifier.run(paths);
  assert.equal(labelService.calls.length, 3);
  assert.equal(second.summary.cached, 3);
  assert.deepEqual(second.forwarded, first.forwarded);
});

test("reclassify re-decides from cached labels without calling the service", async (t) => {
  const input = await makeTempDir(t);
  const output = await makeTempDir(t);
  const path = await writeTestImage(input, "d.jpg", 44);
  const labelService = new FakeLabelService({
    [LOCATION_ARN]: { 44: [{ name: "6_NL_0", confidence: 90 }, { name: "FLOOR", confidence: 85 }] }
  });
  const cache = new ResultCache(output);

  await new LocationClassifier(cache, labelService, LOCATION_ARN, rules).run([path]);
  assert.equal((await cache.read("d")).locationClass, "floor");

  const renamedRules = { ...rules, floorClass: "floor_scale" };
  await new LocationClassifier(cache, labelService, LOCATION_ARN, renamedRules).run([path], { reclassify: true });
  assert.equal((await cache.read("d")).locationClass, "floor_scale");
  assert.equal(labelService.calls.length, 1);
});

test("a failing service call leaves no record and does not stop the batch", async (t) => {
  const input = await makeTempDir(t);
  const output = await makeTempDir(t);
  const paths = [await writeTestImage(input, "e.jpg", 45), await writeTestImage(input, "f.jpg", 46)];
  const labelService = new FakeLabelService({
    [LOCATION_ARN]: { 45: new Error("throttled"), 46: [{ name: "9_KR_0", confidence: 80 }] }
  });
  const cache = new ResultCache(output);

  const result = await new LocationClassifier(cache, labelService, LOCATION_ARN, rules).run(paths);

  assert.deepEqual(result.summary.failures, [{ imageId: "e", code: "service_call_failed", message: "throttled" }]);
  assert.equal(result.summary.processed, 1);
  assert.deepEqual(await cache.listKnownIds(), ["f"]);
});
