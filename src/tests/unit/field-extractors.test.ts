import assert from "node:assert/strict";
import test from "node:test";
import { extractEmail } from "../../profiles/parsers/email.parser";
import { extractYears } from "../../profiles/parsers/experience.parser";
import { extractFreeText } from "../../profiles/parsers/free-text.parser";
import { extractName } from "../../profiles/parsers/name.parser";
import { extractPhone } from "../../profiles/parsers/phone.parser";
import { extractTechStack } from "../../profiles/parsers/tech-stack.parser";

test("extractName accepts one or two capitalized words", () => {
  assert.equal(extractName("John Smith"), "John Smith");
  assert.equal(extractName("  Maria  "), "Maria");
  assert.equal(extractName("José Álvarez"), "José Álvarez");
});

test("extractName keeps only the first two tokens", () => {
  assert.equal(extractName("John Smith Junior"), "John Smith");
});

test("extractName rejects lowercase, numeric and empty replies", () => {
  assert.equal(extractName("john smith"), null);
  assert.equal(extractName("John smith"), null);
  assert.equal(extractName("John 42"), null);
  assert.equal(extractName("R2D2"), null);
  assert.equal(extractName("   "), null);
});

test("extractEmail returns the first address-shaped substring", () => {
  assert.equal(extractEmail("john@x.com"), "john@x.com");
  assert.equal(
    extractEmail("you can reach me at john.smith+jobs@example.co.uk or later"),
    "john.smith+jobs@example.co.uk",
  );
  assert.equal(extractEmail("first a@b.io then c@d.io"), "a@b.io");
});

test("extractEmail rejects addresses without a proper top-level label", () => {
  assert.equal(extractEmail("john@localhost"), null);
  assert.equal(extractEmail("john@x.c"), null);
  assert.equal(extractEmail("not an email"), null);
});

test("extractPhone keeps the trimmed reply when it has 10 to 15 digits", () => {
  assert.equal(extractPhone("555-123-4567"), "555-123-4567");
  assert.equal(extractPhone("  +1 (555) 123-4567 "), "+1 (555) 123-4567");
  assert.equal(extractPhone("123456789012345"), "123456789012345");
});

test("extractPhone rejects too few or too many digits", () => {
  assert.equal(extractPhone("555-1234"), null);
  assert.equal(extractPhone("1234567890123456"), null);
  assert.equal(extractPhone("call me maybe"), null);
});

test("extractYears accepts exactly the range 0 to 50", () => {
  assert.equal(extractYears("0"), 0);
  assert.equal(extractYears("5"), 5);
  assert.equal(extractYears("50"), 50);
  assert.equal(extractYears("51"), null);
  assert.equal(extractYears("none yet"), null);
});

test("extractYears only looks at the first numeral", () => {
  assert.equal(extractYears("about 7 years, maybe 8"), 7);
  assert.equal(extractYears("I have 3.5 years"), 3);
  assert.equal(extractYears("60 months, so 5 years"), null);
});

test("extractTechStack splits on every separator and lowercases", () => {
  assert.deepEqual(extractTechStack("Python, React; Node.js and Docker"), [
    "python",
    "react",
    "node.js",
    "docker",
  ]);
  assert.deepEqual(extractTechStack("AWS\nGCP | Azure"), ["aws", "gcp", "azure"]);
});

test("extractTechStack drops single-character and empty tokens", () => {
  assert.deepEqual(extractTechStack("Go | Rust & C"), ["go", "rust"]);
  assert.equal(extractTechStack(" , ; "), null);
  assert.equal(extractTechStack("R"), null);
});

test("extractTechStack keeps the first ten tokens in order", () => {
  const input = Array.from({ length: 12 }, (_, index) => `Tool${index + 1}`).join(", ");
  const stack = extractTechStack(input);
  assert.deepEqual(stack, [
    "tool1",
    "tool2",
    "tool3",
    "tool4",
    "tool5",
    "tool6",
    "tool7",
    "tool8",
    "tool9",
    "tool10",
  ]);
});

test("extractFreeText trims and rejects blank replies", () => {
  assert.equal(extractFreeText("  Backend Engineer "), "Backend Engineer");
  assert.equal(extractFreeText("   "), null);
});
