import "reflect-metadata";

// Engine events are logged at info; keep test output quiet unless asked for.
if (!process.env.LOG_LEVEL) {
  process.env.LOG_LEVEL = "silent";
}
