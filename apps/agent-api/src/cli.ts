import "dotenv/config";
import { CliUsageError, runCli } from "./cli-commands.js";

runCli(process.argv.slice(2), process.env)
  .then((output) => {
    console.log(output);
  })
  .catch((error: unknown) => {
    if (error instanceof CliUsageError) {
      console.error(error.message);
    } else {
      console.error(error instanceof Error ? `${error.name}: ${error.message}` : error);
    }
    process.exit(1);
  });
