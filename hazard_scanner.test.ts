/// <reference types="node" />
/**
 * Emergency phrase screening against the shipped rule table.
 *
 * Key coverage:
 * - Every shipped phrase, including irregular interior whitespace.
 * - Word-boundary behaviour and declaration-order precedence.
 * - Rule table validation.
 */

import assert from "node:assert";
import path from "node:path";
import test from "node:test";
import {
  EMERGENCY_ADVISORY,
  HazardScanner,
  loadHazardRules,
  parseHazardRules,
} from "./src/services/hazard.service";
import { ConfigurationError } from "./src/utils/errors";

const RULES_PATH = path.resolve(__dirname, "src/config/hazard-rules.json");
const scanner = HazardScanner.fromFile(RULES_PATH);

const messageFor = (text: string): string | null => {
  const result = scanner.scan(text);
  return result.detected ? result.message : null;
};

test("shipped rule table loads in declaration order", () => {
  const rules = loadHazardRules(RULES_PATH);
  assert.strictEqual(rules.length, 5);
  assert.strictEqual(rules[0].pattern, "\\bchest\\s*pain\\b");
  assert.strictEqual(scanner.size, 5);
});

test("every shipped phrase is detected with its advisory message", () => {
  const cases: Array<[string, string]> = [
    ["I get chest pain when I climb stairs", "🚨 CALL 911: May indicate heart attack!"],
    ["Some difficulty breathing at night", "🚨 Seek emergency care immediately!"],
    ["Sudden numbness in my left arm", "🚨 Stroke warning - call emergency services!"],
    ["severe bleeding from a cut", "🚨 Apply pressure and call for emergency help!"],
    ["I keep having suicidal thoughts", "🚨 Contact emergency services or a crisis hotline immediately"],
  ];

  for (const [text, message] of cases) {
    assert.strictEqual(messageFor(text), message, text);
  }
});

test("irregular interior whitespace and case still match", () => {
  const expected = "🚨 CALL 911: May indicate heart attack!";
  assert.strictEqual(messageFor("chest   pain"), expected);
  assert.strictEqual(messageFor("chest\npain"), expected);
  assert.strictEqual(messageFor("CHEST\t PAIN"), expected);
});

test("detection carries the fixed emergency advisory", () => {
  const result = scanner.scan("I have severe bleeding and a headache");
  assert.deepStrictEqual(result, {
    detected: true,
    message: "🚨 Apply pressure and call for emergency help!",
    advisory: EMERGENCY_ADVISORY,
    pattern: "\\bsevere\\s*bleeding\\b",
  });
});

test("unrelated text is not flagged", () => {
  assert.deepStrictEqual(scanner.scan("I have a headache"), { detected: false });
  assert.deepStrictEqual(scanner.scan("I have a mild headache for two days"), { detected: false });
  assert.deepStrictEqual(scanner.scan(""), { detected: false });
});

test("phrases inside longer words do not match", () => {
  assert.strictEqual(messageFor("the chest painting in the hall"), null);
  assert.strictEqual(messageFor("unsevere bleeding"), null);
  assert.strictEqual(messageFor("suicidal thoughtsless"), null);
});

test("the first declared rule wins when several match", () => {
  assert.strictEqual(
    messageFor("difficulty breathing and chest pain"),
    "🚨 CALL 911: May indicate heart attack!"
  );
});

test("custom rule tables are accepted", () => {
  const custom = new HazardScanner([{ pattern: "\\bfainting\\b", message: "Call now" }]);
  const result = custom.scan("Repeated FAINTING spells");
  assert.strictEqual(result.detected, true);
  assert.strictEqual(result.detected && result.message, "Call now");
});

test("custom patterns written in mixed case still match", () => {
  const custom = new HazardScanner([{ pattern: "\\bChest\\s*Pain\\b", message: "Call now" }]);

  assert.deepStrictEqual(custom.scan("Chest Pain after lifting"), {
    detected: true,
    message: "Call now",
    advisory: EMERGENCY_ADVISORY,
    pattern: "\\bChest\\s*Pain\\b",
  });
  assert.strictEqual(custom.scan("chest pain").detected, true);
  assert.deepStrictEqual(custom.scan("chest painting"), { detected: false });
});

test("malformed rule tables are rejected", () => {
  assert.throws(() => parseHazardRules([]), ConfigurationError);
  assert.throws(() => parseHazardRules({ pattern: "x" }), ConfigurationError);
  assert.throws(() => parseHazardRules([{ pattern: "x" }]), ConfigurationError);
  assert.throws(() => new HazardScanner([{ pattern: "(", message: "broken" }]), ConfigurationError);
  assert.throws(() => loadHazardRules(path.resolve(__dirname, "missing-rules.json")), ConfigurationError);
});
