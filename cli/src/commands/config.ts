import chalk from "chalk";
import {
  ConfigError,
  WAYFARER_HOME,
  ensureEnvLoaded,
  redactConfig,
  resolveConfig,
} from "../../../runtime/src/config.js";

export async function configCommand(action?: string) {
  switch (action ?? "show") {
    case "show":
      showConfig();
      break;
    case "path":
      console.log(WAYFARER_HOME);
      break;
    default:
      console.log(chalk.red(`\n❌ Unknown action: ${action}\n`));
      console.log(chalk.gray("Usage: wayfarer config [show|path]\n"));
      process.exitCode = 1;
  }
}

function showConfig() {
  ensureEnvLoaded();
  try {
    const config = redactConfig(resolveConfig());
    console.log(chalk.cyan.bold("\n⚙️  Wayfarer configuration\n"));
    console.log(JSON.stringify(config, null, 2));
    console.log(chalk.gray(`\nConfig directory: ${WAYFARER_HOME}\n`));
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    console.log(chalk.red(`\n❌ ${error.message}\n`));
    process.exitCode = 1;
  }
}
