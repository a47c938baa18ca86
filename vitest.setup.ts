import process from "node:process";

// Fixed environment so config resolution in tests never picks up the caller's overrides.
delete process.env.ADVENT_RUNNER_INPUT_DIR;
delete process.env.ADVENT_RUNNER_SOLUTIONS_DIR;
