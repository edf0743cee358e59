import { beforeEach } from "vitest";
import { clearStatsCache } from "../src/stats/bankStats.js";

process.env.LOG_LEVEL = "silent";

beforeEach(() => {
  clearStatsCache();
});
