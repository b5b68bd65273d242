import type { SourceText } from "../model/text.js";
import { syntaxError } from "../errors.js";

/* =============================================================================
 * Embedded code markers
 * -----------------------------------------------------------------------------
 *   <%= code %>   output marker (block headers: `if`, `for`)
 *   <% code %>    control marker (`else`, `else if`, `end`)
 *   <%# ... %>    comment, dropped
 *   <%%           a literal "<%"
 * ============================================================================= */

export type MarkerKind = "output" | "control";

export type MarkerSegment =
  | {
      readonly kind: "text";
      readonly content: string;
      /** Offset of `content` in the template. */
      readonly start: number;
    }
  | {
      readonly kind: "marker";
      readonly marker: MarkerKind;
      readonly code: string;
      /** Offset of `code` in the template. */
      readonly codeStart: number;
      readonly start: number;
      readonly end: number;
    };

const OPEN = "<%";
const CLOSE = "%>";

export function splitMarkers(source: SourceText): MarkerSegment[] {
  const text = source.text;
  const segments: MarkerSegment[] = [];
  let textStart = 0;
  let i = text.indexOf(OPEN);

  const flush = (end: number): void => {
    if (end > textStart) {
      segments.push({ kind: "text", content: text.slice(textStart, end), start: textStart });
    }
  };

  while (i !== -1) {
    const next = text[i + 2];
    if (next === "%") {
      // `<%%` keeps a literal `<%`; the text up to and including `<%` stays, the extra `%` goes.
      flush(i + 2);
      textStart = i + 3;
      i = text.indexOf(OPEN, textStart);
      continue;
    }

    flush(i);
    const close = text.indexOf(CLOSE, i + 2);
    if (close === -1) {
      throw syntaxError(source, "tessera/unterminated-marker", {
        message: "missing %> for embedded code starting here",
        span: { start: i, end: text.length },
      });
    }

    if (next === "#") {
      // comment
    } else {
      const output = next === "=";
      const codeStart = i + (output ? 3 : 2);
      segments.push({
        kind: "marker",
        marker: output ? "output" : "control",
        code: text.slice(codeStart, close),
        codeStart,
        start: i,
        end: close + 2,
      });
    }
    textStart = close + 2;
    i = text.indexOf(OPEN, textStart);
  }

  flush(text.length);
  return segments;
}
