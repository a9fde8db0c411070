import chalk from "chalk";
import { loadConfig, resolveStorePath, getLogFilePath } from "./config/index.js";
import { AnnotationStore } from "./annotations/store.js";
import { createLogger } from "./log.js";
import { runInteractiveSession } from "./session/interactive.js";

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Appends `text` joined with single spaces, or opens the interactive list when no
 * text is given. Resolves to the process exit code.
 */
export async function runAnnotate(text: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  let store: AnnotationStore;
  let ageWidth: number;
  let log: (message: string) => void;

  try {
    const config = loadConfig(env);
    log = createLogger(getLogFilePath(config, env));
    store = new AnnotationStore({ filePath: resolveStorePath(config, env), log });
    ageWidth = config.ageColumnWidth;
  } catch (error) {
    console.error(chalk.red(errorMessage(error)));
    return 1;
  }

  if (text.length > 0) {
    try {
      store.append(text.join(" "));
      return 0;
    } catch (error) {
      log(`Append failed: ${errorMessage(error)}`);
      console.error(chalk.red(`Annotation failed: ${errorMessage(error)}`));
      return 1;
    }
  }

  try {
    await runInteractiveSession(store, { ageWidth, log });
    return 0;
  } catch (error) {
    console.error(chalk.red(errorMessage(error)));
    return 1;
  }
}
