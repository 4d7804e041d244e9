import * as fs from 'node:fs'

/**
 * Split one CSV record. Handles double-quoted fields with "" escapes; a record
 * spanning several lines is not supported.
 */
export function parseCsvLine(line: string): string[] {
  const fields: string[] = []
  let field = ''
  let quoted = false

  for (let i = 0; i < line.length; i++) {
    const ch = line[i]
    if (quoted) {
      if (ch === '"' && line[i + 1] === '"') {
        field += '"'
        i++
      } else if (ch === '"') {
        quoted = false
      } else {
        field += ch
      }
    } else if (ch === '"') {
      quoted = true
    } else if (ch === ',') {
      fields.push(field)
      field = ''
    } else {
      field += ch
    }
  }

  fields.push(field)
  return fields.map((f) => f.trim())
}

/** Header → value for the last data row, or undefined when the table has no data rows. */
export function lastRow(text: string): Record<string, string> | undefined {
  const lines = text.split(/\r?\n/).filter((line) => line.trim() !== '')
  if (lines.length < 2) return undefined

  const header = parseCsvLine(lines[0])
  const values = parseCsvLine(lines[lines.length - 1])

  const row: Record<string, string> = {}
  header.forEach((name, index) => {
    row[name] = values[index] ?? ''
  })
  return row
}

/** Numeric metric from the artifact's last row; undefined when anything is missing or unreadable. */
export function readMetric(artifactPath: string, metric: string): number | undefined {
  let text: string
  try {
    text = fs.readFileSync(artifactPath, 'utf-8')
  } catch {
    // Absent or unreadable artifact both count as a missing metric
    return undefined
  }

  const row = lastRow(text)
  const raw = row?.[metric]
  if (raw === undefined || raw === '') return undefined

  const value = Number(raw)
  return Number.isFinite(value) ? value : undefined
}
