/**
 * Sample problems
 */

export const SAMPLE_PROBLEMS = [
  {
    id: 'australia',
    name: 'Australia (3 colors)',
    yaml: `# Color the states and territories of Australia
# so that no two neighbours share a color

name: Australia
variables: [WA, NT, SA, Q, NSW, V, T]
domain: [red, green, blue]

constraints:
  - { between: [WA, NT], op: '≠' }
  - { between: [WA, SA], op: '≠' }
  - { between: [NT, SA], op: '≠' }
  - { between: [NT, Q], op: '≠' }
  - { between: [SA, Q], op: '≠' }
  - { between: [SA, NSW], op: '≠' }
  - { between: [SA, V], op: '≠' }
  - { between: [Q, NSW], op: '≠' }
  - { between: [NSW, V], op: '≠' }
`,
  },
  {
    id: 'ordered_chain',
    name: 'Ordered chain',
    yaml: `# A < B < C over three values has exactly one answer

name: Ordered chain
variables: [A, B, C]
domain: [1, 2, 3]

constraints:
  - { between: [A, B], op: '<' }
  - { between: [B, C], op: '<' }
`,
  },
  {
    id: 'triangle_two_colors',
    name: 'Triangle with two colors',
    yaml: `# Three mutually adjacent regions cannot be colored with two colors

name: Triangle with two colors
variables: [X, Y, Z]
domain: [red, green]

allDifferent:
  - [X, Y, Z]
`,
  },
];

export * from './cryptarithmetic';
export * from './mapColoring';
export * from './nQueens';
export * from './sudoku';
