/**
 * Find where a YAML comment begins on a single line.
 *
 * A `#` starts a comment when it is outside quotes and either opens the line
 * or follows whitespace.
 *
 * @param line - One physical line.
 * @param from - Index to start scanning at, assumed to be outside quotes.
 * @returns Index of the `#`, or -1 when the line has no comment.
 */
export function findCommentStart(line: string, from: number = 0): number {
  let quote: '"' | "'" | null = null

  for (let index = from; index < line.length; index++) {
    let char = line[index]

    if (quote === '"') {
      if (char === '\\') {
        index++
      } else if (char === '"') {
        quote = null
      }
    } else if (quote === "'") {
      if (char === "'") {
        quote = null
      }
    } else if (char === '"' || char === "'") {
      let previous = index === 0 ? ' ' : line[index - 1]
      if (previous !== undefined && /[\s:,[{-]/u.test(previous)) {
        quote = char
      }
    } else if (char === '#') {
      let previous = index === 0 ? ' ' : line[index - 1]
      if (previous !== undefined && /\s/u.test(previous)) {
        return index
      }
    }
  }

  return -1
}
