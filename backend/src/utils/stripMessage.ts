/**
 * Cleanup of model-authored text before it is sent back upstream: proxy spans
 * the client echoed back are dropped and whitespace is normalised line by line.
 */

// Tolerates clients that ate the zero width spaces or the newlines around the tags
const PROXY_SPAN = /\u200b?<proxy>\n?[\s\S]*?\n?\u200b?<\/proxy>/g;

export const collapseSpaces = (text: string): string => text.replace(/ +/g, ' ');

const trimNewlines = (text: string): string => text.replace(/^\n+|\n+$/g, '');

export function stripProxyText(text: string): string {
  return text.replace(PROXY_SPAN, '');
}

export function stripMessage(message: string): string {
  const lines = stripProxyText(trimNewlines(message)).split('\n');

  return lines
    .map((line) => {
      const index = Math.max(line.indexOf('-'), line.indexOf('*'));
      const indent = index > 0 ? line.slice(0, index) : '';
      // A bullet keeps its indentation
      if (indent && indent.trim() === '') {
        const rest = line.trimEnd().slice(index);
        return indent + collapseSpaces(rest);
      }
      return collapseSpaces(line.trim());
    })
    .join('\n');
}

export default stripMessage;
