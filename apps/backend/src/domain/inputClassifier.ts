/**
 * Distinguishes a handheld scanner from someone typing on the kiosk keyboard.
 * Scanners emit the whole code in a burst followed by Enter; people don't.
 */

export interface Keystroke {
  key: string;
  /** Epoch milliseconds the key arrived. */
  at: number;
}

export type InputKind = "scanner" | "manual" | "incomplete";

export interface ClassifiedInput {
  kind: InputKind;
  token: string;
}

export interface ClassifierOptions {
  maxGapMs?: number;
  minLength?: number;
}

export const DEFAULT_MAX_GAP_MS = 50;
export const DEFAULT_MIN_LENGTH = 3;

export function classifyInputStream(keystrokes: readonly Keystroke[], options: ClassifierOptions = {}): ClassifiedInput {
  const maxGapMs = options.maxGapMs ?? DEFAULT_MAX_GAP_MS;
  const minLength = options.minLength ?? DEFAULT_MIN_LENGTH;

  const enterIndex = keystrokes.findIndex((stroke) => stroke.key === "Enter");
  const body = (enterIndex === -1 ? keystrokes : keystrokes.slice(0, enterIndex)).filter(
    (stroke) => stroke.key.length === 1,
  );
  const token = body.map((stroke) => stroke.key).join("");

  if (enterIndex === -1) {
    return { kind: "incomplete", token };
  }

  if (token.length < minLength) {
    return { kind: "manual", token };
  }

  for (let i = 1; i < body.length; i += 1) {
    if (body[i].at - body[i - 1].at > maxGapMs) {
      return { kind: "manual", token };
    }
  }

  return { kind: "scanner", token };
}
