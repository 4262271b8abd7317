import type { ConstraintParameter, ConstraintRule, ConstraintTarget } from 'shared'

function rules(
  names: string[],
  types: ConstraintTarget[],
  parameter: ConstraintParameter,
): Array<[string, ConstraintRule]> {
  return names.map(name => [name, { types, parameter }])
}

/** Which base types each built-in constraint applies to, and what it takes */
export const DEFAULT_CONSTRAINT_RULES: Readonly<Record<string, ConstraintRule>> = Object.freeze(
  Object.fromEntries([
    ...rules(['min', 'max'], ['number'], 'number'),
    ...rules(['integer', 'positive'], ['number'], 'none'),
    ...rules(['minLength', 'maxLength', 'length'], ['string'], 'integer'),
    ...rules(
      ['trim', 'uppercase', 'lowercase', 'isEmail', 'isISO', 'isUrl', 'ulid', 'uuid'],
      ['string'],
      'none',
    ),
    ...rules(['pattern'], ['string'], 'string'),
    ...rules(['unique'], ['string', 'number'], 'none'),
    ...rules(['minItems', 'maxItems'], ['array'], 'integer'),
  ]),
)

/** Built-in rules with configured ones layered on top */
export function constraintRules(overrides: Record<string, ConstraintRule> = {}): Record<string, ConstraintRule> {
  return { ...DEFAULT_CONSTRAINT_RULES, ...overrides }
}
