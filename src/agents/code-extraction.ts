const PREAMBLE_PREFIXES = ['Here ', 'Modified ', 'Вот ', 'Изменённый ', 'Измененный '];

/**
 * Pulls source text out of a model reply: the first fenced block if there is
 * one (language-tagged fences win over bare ones), then drops
 * natural-language preamble lines.
 */
export function extractCode(reply: string, fenceLanguages: string[] = ['python', 'py']): string {
  let text = reply.trim();

  const tagged = fenceLanguages.map((lang) => new RegExp('```' + lang + '[ \\t]*\\r?\\n([\\s\\S]*?)(?:```|$)', 'i')).map((re) => re.exec(text)).find((m) => m !== null);
  if (tagged) {
    text = tagged[1] ?? '';
  } else {
    const bare = /```[^\n`]*\r?\n([\s\S]*?)(?:```|$)/.exec(text);
    if (bare) text = bare[1] ?? '';
  }

  const lines = text.split('\n').filter((line) => !PREAMBLE_PREFIXES.some((prefix) => line.startsWith(prefix)));
  return lines.join('\n').trim();
}
