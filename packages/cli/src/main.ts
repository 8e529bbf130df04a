import { run } from "./run";

run(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error("[cli] Unexpected error:", err);
    process.exitCode = 1;
  }
);
