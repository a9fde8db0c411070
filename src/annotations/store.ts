import { readFileSync, writeFileSync, appendFileSync, existsSync, mkdirSync } from "fs";
import { dirname } from "path";
import type { Annotation, AnnotationStoreOptions } from "./types.js";
import { createAnnotation, parseAnnotation, serializeAnnotation } from "./annotation.js";
import { AnnotationParseError, CorruptStoreError } from "./errors.js";

export class AnnotationStore {
  readonly filePath: string;
  private clock: () => number;
  private log: (message: string) => void;

  constructor(options: AnnotationStoreOptions) {
    this.filePath = options.filePath;
    this.clock = options.clock ?? Date.now;
    this.log = options.log ?? (() => {});
  }

  private ensureFile(): void {
    if (existsSync(this.filePath)) {
      return;
    }

    const dir = dirname(this.filePath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    writeFileSync(this.filePath, "");
    this.log(`Created ${this.filePath}`);
  }

  // A hand-edited file may lack its final newline
  private separator(): string {
    if (!existsSync(this.filePath)) {
      return "";
    }
    const existing = readFileSync(this.filePath, "utf-8");
    return existing === "" || existing.endsWith("\n") ? "" : "\n";
  }

  /**
   * Reads every record in file order. The first line that does not parse aborts the
   * whole load with a {@link CorruptStoreError}.
   */
  load(): Annotation[] {
    this.ensureFile();

    const lines = readFileSync(this.filePath, "utf-8").split("\n");
    const annotations: Annotation[] = [];

    lines.forEach((rawLine, i) => {
      const line = rawLine.endsWith("\r") ? rawLine.slice(0, -1) : rawLine;
      if (line === "") {
        return;
      }

      try {
        annotations.push(parseAnnotation(line));
      } catch (error) {
        if (error instanceof AnnotationParseError) {
          throw new CorruptStoreError(this.filePath, i + 1, error);
        }
        throw error;
      }
    });

    this.log(`Loaded ${annotations.length} annotations from ${this.filePath}`);
    return annotations;
  }

  append(content: string): Annotation {
    const annotation = createAnnotation(content, this.clock());

    const dir = dirname(this.filePath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    appendFileSync(this.filePath, this.separator() + serializeAnnotation(annotation) + "\n");

    this.log(`Appended annotation ${annotation.createdAt}`);
    return annotation;
  }

  // Rewrites the file from scratch; deletions only reach disk through here.
  save(annotations: readonly Annotation[]): void {
    const body = annotations.map((a) => serializeAnnotation(a) + "\n").join("");
    writeFileSync(this.filePath, body);
    this.log(`Saved ${annotations.length} annotations to ${this.filePath}`);
  }
}
