import type { Artifact, Checklist } from './types.js';

export interface SpecFacts {
  byteLength: number;
  content: string;
  lineCount: number;
}

export function countLines(content: string): number {
  let lines = 0;
  for (const char of content) {
    if (char === '\n') {
      lines += 1;
    }
  }
  return lines;
}

export const SPEC_CHECKLIST: Checklist<SpecFacts> = {
  kind: 'spec',
  title: 'Specification Validation',
  warningThreshold: 3,
  analyze(artifact: Artifact): SpecFacts {
    return {
      byteLength: artifact.byteLength,
      content: artifact.content,
      lineCount: countLines(artifact.content),
    };
  },
  items: [
    {
      name: 'file_not_empty',
      severity: 'required',
      description: 'File has substantial content (>100 bytes)',
      predicate: facts => facts.byteLength > 100,
    },
    {
      name: 'has_title',
      severity: 'required',
      description: 'File has a title (# heading)',
      predicate: facts => /^# /m.test(facts.content),
    },
    {
      name: 'has_overview',
      severity: 'required',
      description: 'Contains overview/summary section',
      predicate: facts => /(## overview|## summary|## description)/i.test(facts.content),
    },
    {
      name: 'has_requirements',
      severity: 'required',
      description: 'Contains requirements section',
      predicate: facts => /(## requirements|## functional requirements|## user stories)/i.test(facts.content),
    },
    {
      name: 'has_acceptance_criteria',
      severity: 'recommended',
      description: 'Contains acceptance criteria',
      recommendation: 'Add acceptance criteria to define success metrics',
      predicate: facts =>
        /(## acceptance criteria|## success criteria|## definition of done)/i.test(facts.content),
    },
    {
      name: 'has_user_stories',
      severity: 'recommended',
      description: 'Contains user stories',
      recommendation: "Include user stories in 'As a... I want... So that...' format",
      predicate: facts => /(as a|user story|user stories)/i.test(facts.content),
    },
    {
      name: 'has_non_functional',
      severity: 'recommended',
      description: 'Contains non-functional requirements',
      recommendation: 'Document non-functional requirements (performance, security, etc.)',
      predicate: facts =>
        /(## non-functional|## constraints|## assumptions|## dependencies)/i.test(facts.content),
    },
    {
      name: 'has_scope',
      severity: 'recommended',
      description: 'Defines scope boundaries',
      recommendation: 'Define what is in scope and out of scope',
      predicate: facts => /(## scope|## in scope|## out of scope)/i.test(facts.content),
    },
    {
      name: 'reasonable_length',
      severity: 'recommended',
      description: 'Has reasonable length (≥50 lines)',
      recommendation: 'Expand specification with more detail (currently < 50 lines)',
      predicate: facts => facts.lineCount >= 50,
    },
    {
      name: 'no_todos',
      severity: 'optional',
      description: 'No TODO/FIXME placeholders',
      recommendation: 'Remove TODO/FIXME placeholders or complete them',
      predicate: facts => !/TODO|FIXME|XXX|HACK/i.test(facts.content),
    },
  ],
};
