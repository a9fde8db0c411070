import { EventEmitter } from "events";
import type { Annotation } from "../annotations/types.js";
import { formatListEntry, DEFAULT_AGE_WIDTH } from "../annotations/annotation.js";
import { SessionStateError } from "../annotations/errors.js";

export type SessionState =
  | { mode: "browsing" }
  | { mode: "confirmingDelete"; index: number }
  | { mode: "closed" };

export type SessionEvent =
  | { type: "itemActivated"; index: number }
  | { type: "confirmYes" }
  | { type: "confirmNo" }
  | { type: "quit" };

export interface ControllerEvents {
  annotationRemoved: (annotation: Annotation, index: number) => void;
  closed: (annotations: Annotation[]) => void;
}

/**
 * State machine behind the interactive list.
 *
 * The displayed rows are always rendered from the same array that gets saved, so a
 * displayed index is also the index in the collection.
 */
export class ListController extends EventEmitter {
  private items: Annotation[];
  private current: SessionState = { mode: "browsing" };
  private ageWidth: number;

  constructor(annotations: Annotation[], options: { ageWidth?: number } = {}) {
    super();
    this.items = annotations;
    this.ageWidth = options.ageWidth ?? DEFAULT_AGE_WIDTH;
  }

  on<E extends keyof ControllerEvents>(event: E, listener: ControllerEvents[E]): this {
    return super.on(event, listener);
  }

  get state(): SessionState {
    return this.current;
  }

  annotations(): Annotation[] {
    return this.items;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  entries(now: number = Date.now()): string[] {
    return this.items.map((a) => formatListEntry(a, now, this.ageWidth));
  }

  dispatch(event: SessionEvent): SessionState {
    const state = this.current;

    if (event.type === "quit") {
      if (state.mode === "closed") {
        throw new SessionStateError(state.mode, event.type);
      }
      this.current = { mode: "closed" };
      this.emit("closed", this.items);
      return this.current;
    }

    switch (state.mode) {
      case "browsing":
        if (event.type !== "itemActivated") {
          throw new SessionStateError(state.mode, event.type);
        }
        if (!Number.isInteger(event.index) || event.index < 0 || event.index >= this.items.length) {
          throw new RangeError(`No annotation at index ${event.index}`);
        }
        this.current = { mode: "confirmingDelete", index: event.index };
        break;

      case "confirmingDelete":
        if (event.type === "confirmYes") {
          const [removed] = this.items.splice(state.index, 1);
          this.current = { mode: "browsing" };
          this.emit("annotationRemoved", removed, state.index);
        } else if (event.type === "confirmNo") {
          this.current = { mode: "browsing" };
        } else {
          throw new SessionStateError(state.mode, event.type);
        }
        break;

      case "closed":
        throw new SessionStateError(state.mode, event.type);
    }

    return this.current;
  }

  onActivate(index: number): SessionState {
    return this.dispatch({ type: "itemActivated", index });
  }

  onConfirmDelete(): SessionState {
    return this.dispatch({ type: "confirmYes" });
  }

  onCancelDelete(): SessionState {
    return this.dispatch({ type: "confirmNo" });
  }

  quit(): SessionState {
    return this.dispatch({ type: "quit" });
  }
}
