export { fixturePath, readFixture, readJsonFixture } from "./fixtures.js";
export { joinLines, lines } from "./lines.js";
export { assert, describe, test } from "./nodeTest.js";
