// packages/ledger/src/cli/main.ts
import { run } from "./ledger.js";

run(process.argv).then(
  (code) => {
    process.exitCode = code;
  },
  (e: unknown) => {
    console.error(e);
    process.exitCode = 1;
  }
);
