import { assert, describe, test } from "@quire/testkit";
import { formatLayoutError } from "../errors.js";
import { normalizeTracks } from "../tracks.js";

function mustTracks(raw: Parameters<typeof normalizeTracks>[0]): readonly string[] {
  const res = normalizeTracks(raw, "columns");
  assert.equal(res.ok, true);
  if (!res.ok) throw new Error("expected ok");
  return res.value;
}

describe("normalizeTracks", () => {
  test("undefined -> no tracks", () => {
    assert.deepEqual(mustTracks(undefined), []);
  });

  test('"auto" -> one auto track', () => {
    assert.deepEqual(mustTracks("auto"), ["auto"]);
  });

  test("positive integer -> that many auto tracks", () => {
    assert.deepEqual(mustTracks(3), ["auto", "auto", "auto"]);
  });

  test("list entries are normalized element-wise", () => {
    assert.deepEqual(mustTracks(["auto", { fr: 2 }, "1fr", "3cm", 40]), [
      "auto",
      "2fr",
      "1fr",
      "3cm",
      "40pt",
    ]);
  });

  test("empty list stays empty", () => {
    assert.deepEqual(mustTracks([]), []);
  });

  test("zero, negative and fractional counts fail", () => {
    for (const raw of [0, -2, 1.5]) {
      const res = normalizeTracks(raw, "rows");
      assert.equal(res.ok, false);
      if (res.ok) throw new Error("expected failure");
      assert.deepEqual(res.error, { code: "invalid_track_definition", axis: "rows", value: raw });
    }
  });

  test("a bad list entry fails with the whole list as the value", () => {
    const res = normalizeTracks(["auto", { fr: Number.NaN }], "columns");
    assert.equal(res.ok, false);
    if (res.ok) throw new Error("expected failure");
    assert.equal(formatLayoutError(res.error), 'Invalid columns track definition: ["auto",{"fr":null}]');
  });
});
