import type { IndexingSolution, ParseResult } from '../../types/index.js'

// dials.index summary of a refined model, e.g.
//   model 1 (1423 reflections):
//   Crystal:
//       Unit cell: (5.412, 5.412, 5.412, 90.000, 90.000, 90.000)
//       Space group: P 1
const indexingSolutionRegex =
  /model [0-9]+ \(([0-9]+) [^\n]*\n[^\n]*\n[^\n]*Unit cell: \(([^\n]*)\)\n[^\n]*Space group: ([^\n]*)\n/

// Table printed by dials.refine_bravais_settings: a header framed by dashed
// rules, the candidate settings, and a closing rule
const bravaisTableRegex = /-{3,}\n[^\n]*\n-{3,}\n(?:.*\n)*-{3,}/

const normaliseNewlines = (text: string): string => text.replace(/\r\n/g, '\n')

export function parseIndexingSolution(
  stdout: string
): ParseResult<IndexingSolution> {
  const match = normaliseNewlines(stdout).match(indexingSolutionRegex)
  if (!match) {
    return { ok: false, error: 'No indexing solution summary in output' }
  }
  return {
    ok: true,
    value: {
      reflections: parseInt(match[1], 10),
      unitCell: match[2],
      spaceGroup: match[3].trim()
    }
  }
}

export function parseBravaisTable(stdout: string): ParseResult<string> {
  const match = normaliseNewlines(stdout).match(bravaisTableRegex)
  if (!match) {
    return { ok: false, error: 'No Bravais settings table in output' }
  }
  return { ok: true, value: match[0] }
}
