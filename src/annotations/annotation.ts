import type { Annotation } from "./types.js";
import { AnnotationContentError, AnnotationParseError, FutureTimestampError } from "./errors.js";

const SECOND = 1000;
const MINUTE = 60 * SECOND;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;
const DAYS_PER_YEAR = 365;

export const DEFAULT_AGE_WIDTH = 14;

export function createAnnotation(content: string, now: number = Date.now()): Annotation {
  if (/[\r\n]/.test(content)) {
    throw new AnnotationContentError("Annotations cannot contain line breaks");
  }
  return { content, createdAt: now };
}

/**
 * Parses one stored line, `<createdAt> <content>`.
 *
 * Everything before the first space is the timestamp and everything after it is the
 * content, so a line whose content was lost but that still has a space is read as valid.
 */
export function parseAnnotation(line: string): Annotation {
  const delimiter = line.indexOf(" ");
  if (delimiter === -1) {
    throw new AnnotationParseError("MissingDelimiter", line);
  }

  const timestamp = line.slice(0, delimiter);
  if (!/^\+?\d+$/.test(timestamp)) {
    throw new AnnotationParseError("InvalidTimestamp", line);
  }

  const createdAt = Number(timestamp);
  if (!Number.isSafeInteger(createdAt)) {
    throw new AnnotationParseError("InvalidTimestamp", line);
  }

  return { content: line.slice(delimiter + 1), createdAt };
}

export function serializeAnnotation(annotation: Annotation): string {
  return `${annotation.createdAt} ${annotation.content}`;
}

export function formatRelativeAge(annotation: Annotation, now: number = Date.now()): string {
  const elapsed = now - annotation.createdAt;
  if (elapsed < 0) {
    throw new FutureTimestampError(annotation.createdAt, now);
  }

  if (elapsed < SECOND) {
    return "Just now";
  }
  if (elapsed < MINUTE) {
    return `${Math.floor(elapsed / SECOND)} seconds ago`;
  }
  if (elapsed < HOUR) {
    return `${Math.floor(elapsed / MINUTE)} minutes ago`;
  }
  if (elapsed < DAY) {
    return `${Math.floor(elapsed / HOUR)} hours ago`;
  }

  const days = Math.floor(elapsed / DAY);
  if (days < DAYS_PER_YEAR) {
    return `${days} days ago`;
  }
  return `${Math.floor(days / DAYS_PER_YEAR)} years ago`;
}

// "   2 hours ago | buy milk"
export function formatListEntry(
  annotation: Annotation,
  now: number = Date.now(),
  ageWidth: number = DEFAULT_AGE_WIDTH
): string {
  return `${formatRelativeAge(annotation, now).padStart(ageWidth)} | ${annotation.content}`;
}
