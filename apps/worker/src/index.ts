import { createProgram } from "./cli.js";
import { toLogError } from "./logging.js";

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    // eslint-disable-next-line no-console
    console.error(JSON.stringify({ event: "cli.error", ...toLogError(error) }));
    process.exitCode = 1;
  });
