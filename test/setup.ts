import { afterEach } from "vitest";
import { resetConfig } from "../src/config.js";
import { setLogLevel } from "../src/utils/logger.js";

setLogLevel("silent");

afterEach(() => {
  resetConfig();
});
