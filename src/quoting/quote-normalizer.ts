const BACKTICK = "`";

/**
 * Rewrite a possibly dotted, possibly quoted identifier with canonical quotes.
 *
 * Every dot-separated segment is wrapped in `prefix`/`suffix`. Segments that
 * already start with `prefix` or with a backtick keep their content and get
 * their delimiters replaced, so identifiers written for another dialect are
 * converted. An unterminated quoted segment runs to the end of the input.
 * Quote characters inside an unquoted segment are copied as they are.
 *
 * @example
 * ```typescript
 * normalizeIdentifier("public.users", '"', '"');   // '"public"."users"'
 * normalizeIdentifier("`users`.`id`", '"', '"');   // '"users"."id"'
 * normalizeIdentifier("*", '"', '"');              // '*'
 * ```
 */
export function normalizeIdentifier(value: string, prefix: string, suffix: string): string {
  const identifier = value.trim();

  if (identifier === "") return "";

  if (identifier === "*") return "*";

  let output = "";
  let index = 0;

  while (index < identifier.length) {
    const char = identifier[index];

    if (char === ".") {
      output += ".";
      index++;
    } else if (char === prefix || char === BACKTICK) {
      const closing = char === prefix ? suffix : BACKTICK;
      const end = identifier.indexOf(closing, index + 1);
      const stop = end === -1 ? identifier.length : end;

      output += prefix + identifier.slice(index + 1, stop) + suffix;
      // skip the closing delimiter
      index = stop + 1;
    } else {
      const end = identifier.indexOf(".", index);
      const stop = end === -1 ? identifier.length : end;

      output += prefix + identifier.slice(index, stop) + suffix;
      index = stop;
    }
  }

  return output;
}
