export { createRng, type Rng } from "./rng.js";
export { assertLines, assertRectangular } from "./lines.js";
export { assert, describe, test } from "./nodeTest.js";
