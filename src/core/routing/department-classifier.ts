import { InputError } from '../errors.js';
import type { DepartmentCatalogBundle } from './catalog-parser.js';
import { isDepartment } from './catalog-parser.js';
import { KeywordScorer } from './scorer.js';
import {
  DEPARTMENTS,
  type Department,
  type DepartmentSuggestion,
  type DepartmentSuggestionInput,
} from './types.js';

function emptyScores(): Record<Department, number> {
  return {
    architecture: 0,
    engineering: 0,
    quality: 0,
    data: 0,
    product: 0,
    operations: 0,
  };
}

/**
 * Suggests the department an agent definition belongs to. Purpose text and
 * the optional agent name are scored against separate weighted vocabularies
 * and summed; the highest total wins, earlier departments win ties.
 */
export class DepartmentClassifier {
  private readonly purposeScorer: KeywordScorer<Department>;
  private readonly nameScorer: KeywordScorer<Department>;

  constructor(private readonly bundle: DepartmentCatalogBundle) {
    this.purposeScorer = new KeywordScorer(bundle.purposes);
    this.nameScorer = new KeywordScorer(bundle.names);
  }

  score(purpose: string, name?: string): Record<Department, number> {
    const scores = emptyScores();
    for (const [department, score] of this.purposeScorer.score(purpose)) {
      scores[department] += score;
    }
    if (name?.trim()) {
      for (const [department, score] of this.nameScorer.score(name)) {
        scores[department] += score;
      }
    }
    return scores;
  }

  suggest(input: DepartmentSuggestionInput): DepartmentSuggestion {
    const scores = this.score(input.purpose, input.name);
    const override = input.department?.trim().toLowerCase();

    let department: Department;
    let defaulted = false;
    if (override) {
      if (!isDepartment(override)) {
        throw new InputError(
          `Unknown department "${input.department}". Expected one of: ${DEPARTMENTS.join(', ')}`,
          'input_invalid'
        );
      }
      department = override;
    } else {
      const best = this.pickHighest(scores);
      defaulted = best === undefined;
      department = best ?? this.bundle.defaultDepartment;
    }

    return {
      department,
      defaulted,
      overridden: Boolean(override),
      scores,
      profile: this.bundle.profiles[department],
      warnings: this.validateAssignment(input.name ?? '', department, input.purpose),
    };
  }

  validateAssignment(name: string, department: Department, description: string): string[] {
    const warnings: string[] = [];
    for (const rule of this.bundle.assignmentRules) {
      const subject = rule.field === 'name' ? name : description;
      if (!subject || department === rule.expected) {
        continue;
      }
      if (rule.pattern.test(subject)) {
        warnings.push(rule.message);
      }
    }
    return warnings;
  }

  private pickHighest(scores: Record<Department, number>): Department | undefined {
    let best: Department | undefined;
    let bestScore = 0;
    for (const department of this.bundle.purposes.allDomains()) {
      if (scores[department] > bestScore) {
        best = department;
        bestScore = scores[department];
      }
    }
    return best;
  }
}
