/* eslint-disable prettier/prettier */

/**
 * Makes every name of the list unique, keeping the first occurrence as is
 * and numbering the next ones before the extension:
 * `a.csv, a.csv, a.csv` → `a.csv, a_2.csv, a_3.csv`.
 *
 * Order and length are preserved, so `result[i]` belongs to `names[i]`.
 */
export function uniqueFileNames(names: readonly string[]): string[] {
  const taken = new Set<string>()

  return names.map((name) => {
    let candidate = name
    for (let n = 2; taken.has(candidate); n++) {
      candidate = withSuffix(name, n)
    }
    taken.add(candidate)
    return candidate
  })
}

function withSuffix(name: string, n: number): string {
  const dot = name.lastIndexOf('.')
  const slash = name.lastIndexOf('/')
  if (dot <= slash + 1) return `${name}_${n}`

  return `${name.slice(0, dot)}_${n}${name.slice(dot)}`
}
