import { beforeEach } from "vitest";

// Keep logging deterministic regardless of the shell running the suite.
beforeEach(() => {
  process.env.NODE_ENV = "test";
  delete process.env.BBCODE_DEBUG;
});
