import { setupLogging } from "./lib/logging.js";
import { runCli } from "./cli.js";

await setupLogging();
process.exitCode = await runCli(process.argv.slice(2));
