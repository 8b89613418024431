import { afterEach, beforeEach } from "@jest/globals";

let originalExitCode: typeof process.exitCode;

beforeEach(() => {
  originalExitCode = process.exitCode;
});

// Commands report failures through process.exitCode; keep it from leaking
// between tests.
afterEach(() => {
  process.exitCode = originalExitCode;
});
