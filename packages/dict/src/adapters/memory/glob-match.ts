/**
 * Compiles a Redis MATCH pattern (`*`, `?`, `[abc]`, `[^a-z]`, `\x`) into a
 * RegExp anchored at both ends.
 */
export function globToRegExp(pattern: string): RegExp {
  let source = ""
  let i = 0

  while (i < pattern.length) {
    const ch = pattern.charAt(i)

    if (ch === "*") {
      source += "[\\s\\S]*"
    } else if (ch === "?") {
      source += "[\\s\\S]"
    } else if (ch === "\\" && i + 1 < pattern.length) {
      i += 1
      source += escapeRegExp(pattern.charAt(i))
    } else if (ch === "[") {
      const end = pattern.indexOf("]", i + 1)

      if (end === -1) {
        source += "\\["
      } else {
        source += characterClass(pattern.slice(i + 1, end))
        i = end
      }
    } else {
      source += escapeRegExp(ch)
    }

    i += 1
  }

  return new RegExp(`^${source}$`)
}

export function globMatch(pattern: string, value: string): boolean {
  return globToRegExp(pattern).test(value)
}

function characterClass(body: string): string {
  const negated = body.startsWith("^")
  const members = (negated ? body.slice(1) : body).replace(/[\\\]]/g, "\\$&")

  return `[${negated ? "^" : ""}${members}]`
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&")
}
