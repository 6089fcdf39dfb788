import { describe, it, expect } from 'vitest'
import { compileTemplate, renderTemplate } from './template'
import { FormatterFactory } from './FormatterFactory'
import { PathFormatter, TemplateFormatter } from './formatters/BaseFormatter'
import { TemplateError } from '../errors/AuditErrors'
import { makeRecord } from '../../test/fixtures/records'

describe('template', () => {
  const record = makeRecord()

  it('should substitute every placeholder', () => {
    const template = compileTemplate('{name} {path} {mode} {uid} {gid} {size} {atime} {mtime} {ctime} {hash}')

    expect(renderTemplate(template, record)).toBe(
      'a.txt /data/a.txt 644 1000 1000 12 1700000000.25 1700000001.5 1700000002 abc123'
    )
  })

  it('should keep surrounding text and repeated placeholders', () => {
    expect(renderTemplate(compileTemplate('{path}, {hash} ({path})'), record)).toBe(
      '/data/a.txt, abc123 (/data/a.txt)'
    )
  })

  it('should treat doubled braces as literals', () => {
    expect(renderTemplate(compileTemplate('{{path}} = {path}}}'), record)).toBe('{path} = /data/a.txt}')
  })

  it('should reject unknown placeholders', () => {
    expect(() => compileTemplate('{path} {hash_value}')).toThrow(TemplateError)
    expect(() => compileTemplate('{path} {hash_value}')).toThrow('Unknown placeholder "{hash_value}"')
    expect(() => compileTemplate('{}')).toThrow('Unknown placeholder "{}"')
    expect(() => compileTemplate('{size:>10}')).toThrow('Unknown placeholder "{size:>10}"')
  })

  it('should reject unbalanced braces', () => {
    expect(() => compileTemplate('{path')).toThrow('Unclosed "{" at position 0 in template')
    expect(() => compileTemplate('path}')).toThrow('Single "}" at position 4 in template')
  })

  it('should render plain text templates unchanged', () => {
    expect(renderTemplate(compileTemplate('no fields'), record)).toBe('no fields')
    expect(renderTemplate(compileTemplate(''), record)).toBe('')
  })
})

describe('FormatterFactory', () => {
  it('should print paths when no template is configured', () => {
    const formatter = FormatterFactory.createFormatter()

    expect(formatter).toBeInstanceOf(PathFormatter)
    expect(formatter.format(makeRecord({ path: '/srv/x' }))).toBe('/srv/x')
  })

  it('should create a template formatter', () => {
    const formatter = FormatterFactory.createFormatter({ template: '{name}:{size}' })

    expect(formatter).toBeInstanceOf(TemplateFormatter)
    expect(formatter.format(makeRecord())).toBe('a.txt:12')
    expect(formatter.format(makeRecord({ name: 'b.bin', sizeBytes: 0 }))).toBe('b.bin:0')
  })

  it('should fail at creation for a bad template', () => {
    expect(() => FormatterFactory.createFormatter({ template: '{nope}' })).toThrow(TemplateError)
  })
})
