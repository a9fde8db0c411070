import prompts from "prompts";
import chalk from "chalk";
import type { AnnotationStore } from "../annotations/store.js";
import type { Logger } from "../log.js";
import { ListController } from "./controller.js";

export interface SessionOptions {
  ageWidth?: number;
  log?: Logger;
  clock?: () => number;
}

function printEmptyState(): void {
  console.log(chalk.yellow("You have not registered any annotation!"));
  console.log(chalk.dim("Try: annotate [text]"));
}

/**
 * Lists the stored annotations and lets the user remove them one at a time. The
 * collection is written back once, when the session closes.
 *
 * @returns how many annotations were removed
 */
export async function runInteractiveSession(
  store: AnnotationStore,
  options: SessionOptions = {}
): Promise<number> {
  const log = options.log ?? (() => {});
  const clock = options.clock ?? Date.now;
  const controller = new ListController(store.load(), { ageWidth: options.ageWidth });
  let removed = 0;

  controller.on("annotationRemoved", (annotation) => {
    removed++;
    log(`Removed annotation ${annotation.createdAt}`);
  });

  controller.on("closed", (annotations) => {
    store.save(annotations);
    log(`Session closed with ${annotations.length} annotations`);
  });

  let cursor = 0;

  while (controller.state.mode !== "closed") {
    if (controller.isEmpty()) {
      printEmptyState();
      controller.quit();
      break;
    }

    const entries = controller.entries(clock());
    const { selected } = await prompts({
      type: "select",
      name: "selected",
      message: "Annotations",
      hint: "- Enter to remove. Esc to quit.",
      choices: entries.map((title, index) => ({ title, value: index })),
      initial: Math.min(cursor, entries.length - 1),
    });

    // Esc / Ctrl-C leaves the answer unset
    if (typeof selected !== "number") {
      controller.quit();
      break;
    }

    controller.onActivate(selected);
    cursor = selected;

    const { content } = controller.annotations()[selected];
    const { remove } = await prompts({
      type: "confirm",
      name: "remove",
      message: `Remove "${content}"?`,
      initial: false,
    });

    if (remove === true) {
      controller.onConfirmDelete();
    } else {
      controller.onCancelDelete();
    }
  }

  return removed;
}
