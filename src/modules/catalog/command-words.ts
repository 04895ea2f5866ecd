import { parse } from "shell-quote";

const WORD_BOUNDARY = /[\s|&;()<>]/;

/**
 * Backslash-escapes every "#" that does not start a word, outside quotes.
 * shell-quote opens a comment at any "#"; a shell only at the start of a word.
 */
function escapeMidWordHashes(text: string): string {
  let escaped = "";
  let quote: string | null = null;
  let afterBackslash = false;

  for (let i = 0; i < text.length; i++) {
    const c = text[i];
    if (afterBackslash) {
      afterBackslash = false;
    } else if (quote !== null) {
      if (c === quote) quote = null;
      else if (c === "\\" && quote === '"') afterBackslash = true;
    } else if (c === "'" || c === '"') {
      quote = c;
    } else if (c === "\\") {
      afterBackslash = true;
    } else if (c === "#" && i > 0 && !WORD_BOUNDARY.test(text[i - 1])) {
      escaped += "\\";
    }
    escaped += c;
  }
  return escaped;
}

/**
 * Splits a command string into argv words the way a POSIX shell would:
 * quotes keep segments together and are removed, backslashes escape.
 *
 *   "sh 'start the game.sh'"  → ["sh", "start the game.sh"]
 *
 * Variable references are kept literally ("$HOME" stays "$HOME") since the
 * command is never run through a shell. Glob patterns are kept as words.
 *
 * A "#" inside a word is literal ("Game#2.exe"). Returns null when the
 * string contains a shell control operator (";", "|", "&&", redirections)
 * or a comment ("#" at the start of a word), none of which can be
 * expressed as argv.
 */
export function splitCommandWords(text: string): string[] | null {
  const words: string[] = [];
  for (const entry of parse(escapeMidWordHashes(text), (name) => `$${name}`)) {
    if (typeof entry === "string") {
      words.push(entry);
    } else if ("pattern" in entry) {
      words.push(entry.pattern);
    } else {
      return null;
    }
  }
  return words;
}
