import { run } from "./index.js";

run(process.argv.slice(2)).catch((error: unknown) => {
  console.error(`skillbook: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
