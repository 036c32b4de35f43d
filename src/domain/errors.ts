export type StructureIssue =
  | { kind: 'missingFolder'; folderId: string }
  | { kind: 'orphanFolder'; folderId: string }
  | { kind: 'duplicateFolderRef'; folderId: string }
  | { kind: 'folderIdMismatch'; folderId: string }
  | { kind: 'duplicateItem'; itemId: string };

export function describeStructureIssue(issue: StructureIssue): string {
  switch (issue.kind) {
    case 'missingFolder':
      return `Folder ${issue.folderId} is in the root sequence but not in the folder table`;
    case 'orphanFolder':
      return `Folder ${issue.folderId} is in the folder table but not in the root sequence`;
    case 'duplicateFolderRef':
      return `Folder ${issue.folderId} appears more than once in the root sequence`;
    case 'folderIdMismatch':
      return `Folder table key ${issue.folderId} does not match the folder's id`;
    case 'duplicateItem':
      return `Item ${issue.itemId} is owned by more than one container`;
  }
}

/** The root sequence and folder table disagree. Always a programming defect. */
export class StructuralViolationError extends Error {
  readonly issues: StructureIssue[];

  constructor(issues: StructureIssue[]) {
    super(`Structural violation: ${issues.map(describeStructureIssue).join('; ')}`);
    this.name = 'StructuralViolationError';
    this.issues = issues;
  }
}

export type SeedProblem =
  | { kind: 'duplicateId'; id: string }
  | { kind: 'blankName'; entry: 'item' | 'folder'; id?: string };

function describeSeedProblem(problem: SeedProblem): string {
  switch (problem.kind) {
    case 'duplicateId':
      return `Duplicate id in seed data: ${problem.id}`;
    case 'blankName':
      return problem.id
        ? `Blank ${problem.entry} name in seed data: ${problem.id}`
        : `Blank ${problem.entry} name in seed data`;
  }
}

/** Seed data handed to `initialize` cannot form a valid model. */
export class SeedError extends Error {
  readonly problem: SeedProblem;

  constructor(problem: SeedProblem) {
    super(describeSeedProblem(problem));
    this.name = 'SeedError';
    this.problem = problem;
  }
}
