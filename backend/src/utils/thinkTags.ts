const THINK_OPEN = '<think>';
const THINK_CLOSE = '</think>';
const RESPONSE_OPEN = '<response>';
const RESPONSE_CLOSE = '</response>';

export interface ThinkExtraction {
  text: string;
  /** Reasoning that was cut out, if any was found. */
  thinking?: string;
}

/**
 * Removes `<think>...</think>` (or everything before a lone `</think>`) and
 * then keeps only what is inside `<response>...</response>` (or after a lone
 * `<response>`). Unbalanced tags in any other arrangement are left alone.
 */
export function extractThinking(input: string): ThinkExtraction {
  let text = input;
  let thinking: string | undefined;

  const tOpen = text.indexOf(THINK_OPEN);
  const tClose = text.indexOf(THINK_CLOSE);
  if (tOpen > -1 && tOpen < tClose) {
    thinking = text.slice(tOpen + THINK_OPEN.length, tClose);
    text = text.slice(0, tOpen) + text.slice(tClose + THINK_CLOSE.length);
  } else if (tClose > -1) {
    thinking = text.slice(0, tClose);
    text = text.slice(tClose + THINK_CLOSE.length);
  }

  const rOpen = text.indexOf(RESPONSE_OPEN);
  const rClose = text.indexOf(RESPONSE_CLOSE);
  if (rOpen > -1 && rOpen < rClose) {
    text = text.slice(rOpen + RESPONSE_OPEN.length, rClose);
  } else if (rOpen > -1) {
    text = text.slice(rOpen + RESPONSE_OPEN.length);
  }

  return thinking === undefined ? { text } : { text, thinking };
}

/** Puts kept reasoning back in front of the reply. */
export function prependThinking(text: string, thinking: string): string {
  return `${THINK_OPEN}\n${thinking}\n${THINK_CLOSE}\n${text}`;
}
