import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { NameGenerator, STORED_NAME_PATTERN, extractExtension, timePrefix } from "./naming.js";

const fixed = new Date(Date.UTC(2026, 9, 18, 7, 5, 9, 42));
const gen = new NameGenerator(() => fixed);

describe("extractExtension", () => {
  it("takes the lower-cased text after the final dot", () => {
    assert.equal(extractExtension("report.PDF"), "pdf");
    assert.equal(extractExtension("archive.tar.gz"), "gz");
  });

  it("returns empty for missing or unusable extensions", () => {
    assert.equal(extractExtension("README"), "");
    assert.equal(extractExtension(".bashrc"), "");
    assert.equal(extractExtension("trailing."), "");
    assert.equal(extractExtension("bad.ex$t"), "");
    assert.equal(extractExtension("dir.d/name"), "");
  });
});

describe("NameGenerator", () => {
  it("encodes UTC time as sortable digits", () => {
    assert.equal(timePrefix(fixed), "20261018070509042");
  });

  it("builds time, token, fragment and extension", () => {
    assert.match(gen.generate("report.pdf"), /^20261018070509042_[0-9a-f]{12}_report\.pdf$/);
  });

  it("keeps only a short sanitized fragment of the stem", () => {
    assert.match(gen.generate("my file (1).TAR.GZ"), /^20261018070509042_[0-9a-f]{12}_myfile1T\.gz$/);
    assert.match(gen.generate("../../etc/passwd"), /^20261018070509042_[0-9a-f]{12}_passwd$/);
    assert.match(gen.generate(".bashrc"), /^20261018070509042_[0-9a-f]{12}_bashrc$/);
  });

  it("omits the fragment when nothing survives sanitizing", () => {
    assert.match(gen.generate("файл.txt"), /^20261018070509042_[0-9a-f]{12}\.txt$/);
    assert.match(gen.generate("$$$"), /^20261018070509042_[0-9a-f]{12}$/);
  });

  it("always produces names in the allowed character class", () => {
    const inputs = ["report.pdf", "a/b\\c.txt", "x\0y.png", "<script>.html", "", "..", "🙂.jpg"];
    for (const input of inputs) {
      assert.match(gen.generate(input), STORED_NAME_PATTERN, input);
    }
  });

  it("does not collide across 10,000 concurrent generations of the same name", async () => {
    const live = new NameGenerator();
    const names = await Promise.all(
      Array.from({ length: 10_000 }, () => Promise.resolve().then(() => live.generate("same.txt"))),
    );
    assert.equal(new Set(names).size, 10_000);
  });
});
