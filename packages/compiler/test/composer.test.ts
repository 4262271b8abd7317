import { describe, it, expect } from 'vitest'
import { composeSources } from './helpers.js'

describe('Composer', () => {
  it('overrides an inherited field in place and keeps the rest', () => {
    const { graph, diagnostics } = composeSources({
      'a.spec': 'B {\n  x number\n  y string\n}\n\nA {\n  >B\n  x string\n}\n',
    })

    const a = graph.entities.get('A')
    expect(a?.fields.map(f => [f.name, f.baseType, f.inheritedFrom])).toEqual([
      ['x', 'string', undefined],
      ['y', 'string', 'B'],
    ])
    expect(diagnostics).toEqual([{
      kind: 'TypeChangingOverrideWarning',
      severity: 'warning',
      message: "Field 'x' in 'A' overrides number from 'B' with string",
      file: 'a.spec',
      line: 8,
      column: 3,
      declaration: 'A',
      field: 'x',
      inheritedType: 'number',
      localType: 'string',
    }])
  })

  it('does not warn when an override keeps the type', () => {
    const { graph, diagnostics } = composeSources({
      'a.spec': 'B {\n  x string\n}\n\nA {\n  >B\n  x string<trim>\n}\n',
    })
    expect(diagnostics).toEqual([])
    expect(graph.entities.get('A')?.fields[0].constraints.map(c => c.name)).toEqual(['trim'])
  })

  it('lets the first-listed copy source win a collision', () => {
    const { graph, diagnostics } = composeSources({
      'a.spec': 'P {\n  v string\n}\n\nQ {\n  v number\n  w boolean\n}\n\nR {\n  >P\n  >Q\n  z string\n}\n',
    })
    expect(diagnostics).toEqual([])
    expect(graph.entities.get('R')?.fields.map(f => [f.name, f.baseType, f.inheritedFrom])).toEqual([
      ['v', 'string', 'P'],
      ['w', 'boolean', 'Q'],
      ['z', 'string', undefined],
    ])
  })

  it('tracks the original declaration through chained copies', () => {
    const { graph } = composeSources({
      'a.spec': 'A {\n  id string\n}\n\nB {\n  >A\n  name string\n}\n\nC {\n  >B\n}\n',
    })
    expect(graph.entities.get('C')?.fields.map(f => [f.name, f.inheritedFrom])).toEqual([
      ['id', 'A'],
      ['name', 'B'],
    ])
  })

  it('resolves references into imported files', () => {
    const { graph, diagnostics } = composeSources({
      'orders/order.data.spec': 'import @/shared/address.data\n\nOrder {\n  shippingAddress#Address\n}\n',
      'shared/address.data.spec': 'Address {\n  street string\n  city string\n}\n',
    })
    expect(diagnostics).toEqual([])

    const [field] = graph.entities.get('Order')?.fields ?? []
    expect(field).toMatchObject({ name: 'shippingAddress', baseType: 'reference', target: 'Address' })
    expect(graph.entities.get(field.target ?? '')?.fields.map(f => f.name)).toEqual(['street', 'city'])
  })

  it('reports an undefined reference', () => {
    const { diagnostics } = composeSources({ 'o.spec': 'Order {\n  customer#Missing\n}\n' })
    expect(diagnostics).toEqual([{
      kind: 'UnknownReferenceError',
      severity: 'error',
      message: "Field 'customer' references unknown entity 'Missing'",
      file: 'o.spec',
      line: 2,
      column: 3,
      field: 'customer',
      name: 'Missing',
    }])
  })

  it('does not see declarations of files that are not imported', () => {
    const { diagnostics } = composeSources({
      'a.spec': 'A {\n  x string\n}\n',
      'b.spec': 'B {\n  a#A\n}\n',
    })
    expect(diagnostics.map(d => d.message)).toEqual([
      "Field 'a' references 'A' from a.spec, which is not imported by b.spec",
    ])
  })

  it('allows forward and recursive references within a file', () => {
    const { diagnostics } = composeSources({
      'tree.spec': 'Node {\n  children#Node[]\n  owner#Tree?\n}\n\nTree {\n  root#Node\n}\n',
    })
    expect(diagnostics).toEqual([])
  })

  it('reports a copy source that is not resolved yet', () => {
    const { graph, diagnostics } = composeSources({
      'a.spec': 'A {\n  >B\n  own string\n}\n\nB {\n  x string\n}\n',
    })
    expect(diagnostics).toEqual([{
      kind: 'UnknownCopySourceError',
      severity: 'error',
      message: "Cannot copy into 'A': unknown entity 'B'",
      file: 'a.spec',
      line: 2,
      column: 3,
      declaration: 'A',
      name: 'B',
    }])
    expect(graph.entities.get('A')?.fields.map(f => f.name)).toEqual(['own'])
  })

  it('refuses to copy from an endpoint or into a reference', () => {
    const { diagnostics } = composeSources({
      'api.spec': 'Ping {\n  method GET\n  path /ping\n}\n\nA {\n  >Ping\n  p#Ping\n}\n',
    })
    expect(diagnostics.map(d => [d.kind, d.message])).toEqual([
      ['UnknownCopySourceError', "Cannot copy into 'A': 'Ping', which is an endpoint, not a data declaration"],
      ['UnknownReferenceError', "Field 'p' references 'Ping', which is an endpoint, not a data declaration"],
    ])
  })

  it('rejects a name declared in two files whichever comes first', () => {
    const text = 'Customer {\n  id string\n}\n'
    for (const sources of [{ 'a.spec': text, 'b.spec': text }, { 'b.spec': text, 'a.spec': text }]) {
      const { diagnostics } = composeSources(sources)
      expect(diagnostics).toHaveLength(1)
      const [duplicate] = diagnostics
      expect(duplicate.kind).toBe('DuplicateNameError')
      if (duplicate.kind === 'DuplicateNameError') {
        expect(duplicate.name).toBe('Customer')
        expect([duplicate.firstFile, duplicate.secondFile].sort()).toEqual(['a.spec', 'b.spec'])
      }
    }
  })

  it('names the topologically earlier file first', () => {
    const { diagnostics } = composeSources({
      'app.spec': 'import @/lib\n\nCustomer {\n  id string\n}\n',
      'lib.spec': 'Customer {\n  id number\n}\n',
    })
    expect(diagnostics[0]).toMatchObject({ firstFile: 'lib.spec', secondFile: 'app.spec', file: 'app.spec', line: 3 })
  })

  it('warns about a field declared twice and keeps the last one', () => {
    const { graph, diagnostics } = composeSources({ 'a.spec': 'A {\n  x string\n  x number\n}\n' })
    expect(diagnostics.map(d => [d.kind, d.line])).toEqual([['DuplicateFieldWarning', 3]])
    expect(graph.entities.get('A')?.fields.map(f => [f.name, f.baseType])).toEqual([['x', 'number']])
  })

  it('expands copies inside nested objects and endpoint sections', () => {
    const { graph, diagnostics } = composeSources({
      'orders.endpoint.spec': [
        'Auth {',
        '  Authorization string',
        '}',
        '',
        'Order {',
        '  id string',
        '  meta {',
        '    >Auth',
        '  }',
        '}',
        '',
        'GetOrder {',
        '  method GET',
        '  path /orders/:id',
        '  headers {',
        '    >Auth',
        '    Accept? string',
        '  }',
        '  params {',
        '    id string',
        '  }',
        '  response {',
        '    found {',
        '      status 200',
        '      body#Order',
        '    }',
        '  }',
        '}',
      ].join('\n'),
    })
    expect(diagnostics).toEqual([])

    expect(graph.entities.get('Order')?.fields[1].fields?.map(f => f.name)).toEqual(['Authorization'])

    const endpoint = graph.endpoints.get('GetOrder')
    expect(endpoint?.sections.headers?.fields.map(f => f.name)).toEqual(['Authorization', 'Accept'])

    const body = endpoint?.responses[0].body
    expect(body?.target).toBe('Order')
    expect(body?.fields.map(f => f.name)).toEqual(['id', 'meta'])
    expect(body?.fields[0]).toEqual(graph.entities.get('Order')?.fields[0])
    expect(body?.fields[0]).not.toBe(graph.entities.get('Order')?.fields[0])
  })

  it('reports a section reference to an unknown entity', () => {
    const { diagnostics } = composeSources({
      'a.endpoint.spec': 'Ping {\n  method GET\n  path /ping\n  body#Nothing\n}\n',
    })
    expect(diagnostics).toEqual([{
      kind: 'UnknownReferenceError',
      severity: 'error',
      message: "Section 'body' references unknown entity 'Nothing'",
      file: 'a.endpoint.spec',
      line: 4,
      column: 3,
      field: 'body',
      name: 'Nothing',
    }])
  })

  it('warns about an endpoint declared in a data file', () => {
    const { diagnostics } = composeSources({ 'ping.data.spec': 'Ping {\n  method GET\n  path /ping\n}\n' })
    expect(diagnostics.map(d => [d.kind, d.severity])).toEqual([['FileKindMismatchWarning', 'warning']])
  })

  it('does not alias the source entity when copying', () => {
    const { graph } = composeSources({
      'a.spec': 'Base {\n  tags string[]<minItems:1>\n}\n\nChild {\n  >Base\n}\n',
    })
    const inherited = graph.entities.get('Child')?.fields[0]
    const original = graph.entities.get('Base')?.fields[0]
    expect(inherited?.constraints).toEqual(original?.constraints)
    expect(inherited?.constraints).not.toBe(original?.constraints)
  })

  it('produces the same graph when run again on the same input', () => {
    const sources = {
      'a.spec': 'Money {\n  amount number\n}\n\nPrice {\n  >Money\n  currency string\n}\n',
    }
    const first = composeSources(sources)
    const second = composeSources(sources)
    expect(second.graph).toEqual(first.graph)
    expect(first.graph.entities.get('Money')?.fields.map(f => f.name)).toEqual(['amount'])
  })

  it('warns when an inline object override changes its members', () => {
    const { diagnostics } = composeSources({
      'a.spec': 'B {\n  o {\n    x string\n  }\n}\n\nA {\n  >B\n  o {\n    y number\n  }\n}\n',
    })
    expect(diagnostics).toEqual([{
      kind: 'TypeChangingOverrideWarning',
      severity: 'warning',
      message: "Field 'o' in 'A' overrides { x string } from 'B' with { y number }",
      file: 'a.spec',
      line: 9,
      column: 3,
      declaration: 'A',
      field: 'o',
      inheritedType: '{ x string }',
      localType: '{ y number }',
    }])
  })

  it('does not warn when an inline object override keeps its members', () => {
    const { diagnostics } = composeSources({
      'a.spec': 'B {\n  o {\n    x? string\n  }\n}\n\nA {\n  >B\n  o {\n    x? string<trim>\n  }\n}\n',
    })
    expect(diagnostics).toEqual([])
  })
})
