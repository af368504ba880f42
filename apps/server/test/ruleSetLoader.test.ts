import test from "node:test";
import assert from "node:assert/strict";
import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { isPipelineError } from "../src/services/pipelineError.js";
import {
  loadRuleSets,
  loadTextReadingPrompt,
  parseLocationRuleSet,
  parseMaterialRuleSet
} from "../src/services/rules/ruleSetLoader.js";
import { makeTempDir } from "./helpers.js";

const invalidRuleSet = (error: unknown) => isPipelineError(error) && error.code === "invalid_rule_set";

test("the bundled rule sets load and validate", async () => {
  const rules = await loadRuleSets();
  assert.equal(rules.location.minConfidence, 75);
  assert.equal(rules.location.floorClass, "floor");
  assert.equal(rules.location.classToDir.floor, "classified/locations/floor");
  assert.equal(rules.location.classToDir["6_BE_180"], "classified/locations/6 BE");
  assert.equal(rules.material.minConfidence, 10);
  assert.equal(rules.material.thresholds.OCC_scale, 60);
  assert.equal(rules.material.deviceToObject.RADIATION, "radiometer");
  assert.equal(rules.textReading.minCropWidth, 60);
  assert.equal(rules.textReading.minCropHeight, 30);
});

test("a location rule set without location names is rejected", () => {
  assert.throws(
    () => parseLocationRuleSet({ deviceNames: [], extraNames: [] }),
    (error) => invalidRuleSet(error) && error instanceof Error && error.message.includes("locationNames")
  );
});

test("thresholds outside 0-100 are rejected", async () => {
  const { location } = await loadRuleSets();
  assert.throws(() => parseLocationRuleSet({ ...location, thresholds: { "6_IT_0": 140 } }), invalidRuleSet);
});

test("a location rule set must map its floor class to a directory", async () => {
  const { location } = await loadRuleSets();
  assert.throws(
    () => parseLocationRuleSet({ ...location, floorClass: "floor_scale" }),
    (error) => invalidRuleSet(error) && error instanceof Error && error.message.endsWith("no directory for floor class: floor_scale")
  );
});

test("a material rule set must declare the objects its decision tree uses", async () => {
  const { material } = await loadRuleSets();
  assert.throws(
    () => parseMaterialRuleSet({ ...material, signObject: "placard" }),
    (error) => invalidRuleSet(error) && error instanceof Error && error.message.endsWith("unknown objects: placard")
  );
});

test("a rules directory without rule files fails to load", async (t) => {
  await assert.rejects(loadRuleSets(await makeTempDir(t)), invalidRuleSet);
});

test("an inline prompt has its escaped newlines expanded", async () => {
  assert.equal(await loadTextReadingPrompt({ prompt: "Read the panel.\\nAnswer on the last line." }), "Read the panel.\nAnswer on the last line.");
});

test("a prompt file takes precedence over the inline prompt", async (t) => {
  const dir = await makeTempDir(t);
  const promptFile = join(dir, "prompt.txt");
  await writeFile(promptFile, "  From the file.\n");
  assert.equal(await loadTextReadingPrompt({ promptFile, prompt: "Inline" }), "From the file.");
});

test("the bundled prompt asks for the digit and flag on the last line", async () => {
  const prompt = await loadTextReadingPrompt();
  assert.match(prompt.split("\n").at(-1) ?? "", /"\{digit\/HSCODE\} - \{flagged\/None\}"/);
});

test("a missing prompt file is a configuration error", async (t) => {
  const promptFile = join(await makeTempDir(t), "absent.txt");
  await assert.rejects(
    loadTextReadingPrompt({ promptFile }),
    (error) => isPipelineError(error) && error.code === "missing_config"
  );
});
