/**
 * Change classification heuristics
 *
 * Type inference is a decision list: each heuristic runs only when the ones
 * before it abstain. A heuristic that matches only part of the change set
 * abstains and counts as an ambiguous firing, which lowers the confidence of
 * whatever type is finally chosen.
 */

import { minimatch } from 'minimatch';
import {
  defaultWardenConfig,
  type ChangeSet,
  type Classification,
  type FileChange,
  type PackageMap,
  type WardenConfig,
} from '@commit-warden/contracts';
import { changedLines, countHunkChanges } from '../diff/stats';
import { calculateAdditionRatio, findDominantHunk } from './pattern-detector';

export const MULTI_SCOPE = 'multi';

/** Confidence lost per heuristic that matched only part of the change set */
export const AMBIGUITY_PENALTY = 0.15;

interface Candidate {
  type: string;
  confidence: number;
}

function matchesAny(path: string, globs: readonly string[]): boolean {
  return globs.some((glob) => minimatch(path, glob, { dot: true }));
}

function round(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Scope candidates: touched packages ordered by changed lines (descending),
 * then by name. The repository root and the synthetic root package never
 * become a scope.
 */
export function inferScopes(changeSet: ChangeSet, packageMap: PackageMap, maxScopes: number): string[] {
  const linesByPath = new Map(changeSet.files.map((file) => [file.path, Math.max(1, changedLines(file))]));
  const byPackage = new Map<string, { name: string; lines: number }>();

  for (const assignment of packageMap.assignments) {
    const lines = linesByPath.get(assignment.path) ?? 1;
    for (const pkg of assignment.packages) {
      if (pkg.synthetic || pkg.root === '') continue;
      const entry = byPackage.get(pkg.id) ?? { name: pkg.name, lines: 0 };
      entry.lines += lines;
      byPackage.set(pkg.id, entry);
    }
  }

  const scopes = [...byPackage.values()]
    .sort((a, b) => b.lines - a.lines || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    .map((entry) => entry.name);

  return scopes.length > maxScopes ? [MULTI_SCOPE] : scopes;
}

/**
 * A fix-shaped change only modifies existing files, and every hunk is small
 * and removes or rewrites at least one existing line.
 */
export function isSmallModification(files: readonly FileChange[], smallHunkLines: number): boolean {
  return files.every(
    (file) =>
      file.kind === 'modified' &&
      file.hunks.length > 0 &&
      file.hunks.every((hunk) => {
        const { additions, deletions } = countHunkChanges(hunk);
        return deletions > 0 && additions + deletions <= smallHunkLines;
      })
  );
}

/**
 * Classify a change set
 *
 * Never throws. An empty or unclassifiable change set yields `chore` (or the
 * first allowed type when chore is not allowed) with confidence 0.
 */
export function classifyChangeSet(
  changeSet: ChangeSet,
  packageMap: PackageMap,
  config: WardenConfig = defaultWardenConfig
): Classification {
  const { classifier, rules } = config;
  const isAllowed = (type: string) => rules.allowedTypes.includes(type) && !rules.forbiddenTypes.includes(type);
  const files = changeSet.files;
  const reasons: string[] = [];
  let ambiguous = 0;
  let breaking = false;
  let candidate: Candidate | null = null;

  const propose = (type: string, confidence: number, reason: string): Candidate | null => {
    if (!isAllowed(type)) {
      reasons.push(`${reason}, but type "${type}" is not allowed`);
      return null;
    }
    reasons.push(reason);
    return { type, confidence };
  };

  if (files.length === 0) {
    reasons.push('empty change set');
  } else {
    // 1-3: every path in one category
    const categories: Array<{ type: string; globs: readonly string[]; confidence: number }> = [
      { type: 'test', globs: classifier.testPaths, confidence: 0.95 },
      { type: 'docs', globs: classifier.docsPaths, confidence: 0.95 },
      { type: 'ci', globs: classifier.ciPaths, confidence: 0.9 },
    ];

    for (const category of categories) {
      const matched = files.filter((file) => matchesAny(file.path, category.globs)).length;
      if (matched === files.length) {
        candidate = propose(category.type, category.confidence, `all ${matched} path(s) match ${category.type} patterns`);
      } else if (matched > 0) {
        ambiguous++;
        reasons.push(`${matched} of ${files.length} path(s) match ${category.type} patterns`);
      }
      if (candidate) break;
    }

    const allEdits = files.flatMap((file) => file.hunks.flatMap((hunk) => hunk.edits));
    const additions = allEdits.filter((edit) => edit.kind === 'added');

    // 4: deletions only
    if (!candidate) {
      const onlyDeletions =
        additions.length === 0 &&
        files.every((file) => file.kind === 'deleted' || file.kind === 'modified') &&
        (files.some((file) => file.kind === 'deleted') || allEdits.some((edit) => edit.kind === 'removed'));
      if (onlyDeletions) {
        candidate = propose('chore', 0.4, 'only deletions, no additions');
      } else if (calculateAdditionRatio(files) < 0.2) {
        ambiguous++;
        reasons.push('mostly deletions');
      }
    }

    // 5: breaking markers, then feat/fix by shape
    if (!candidate) {
      const marker = classifier.breakingMarkers.find((m) => additions.some((edit) => edit.text.includes(m)));
      if (marker !== undefined) {
        breaking = true;
        reasons.push(`added lines contain breaking marker "${marker}"`);
      }

      const boost = breaking ? 0.2 : 0;
      candidate = isSmallModification(files, classifier.smallHunkLines)
        ? propose('fix', 0.6 + boost, 'small hunks modifying existing lines')
        : propose('feat', 0.6 + boost, 'new or extended functionality');
    }
  }

  let type: string;
  let confidence: number;
  if (candidate) {
    type = candidate.type;
    confidence = round(Math.max(0, candidate.confidence - ambiguous * AMBIGUITY_PENALTY));
  } else {
    type = isAllowed('chore') ? 'chore' : rules.allowedTypes.find(isAllowed) ?? 'chore';
    confidence = 0;
    reasons.push('no heuristic applied');
  }

  const dominant = findDominantHunk(files);
  const context = dominant?.header.trim();

  const classification: Classification = {
    type,
    scopes: inferScopes(changeSet, packageMap, classifier.maxScopes),
    breaking,
    confidence,
    reasons,
    diagnostics: [...packageMap.diagnostics],
  };
  if (context) {
    classification.dominantContext = context;
  }
  return classification;
}
