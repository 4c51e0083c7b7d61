import {readFile} from 'node:fs/promises';

import {z} from 'zod';

import {replaceFileAtomically} from './durableFile.js';
import {describeError, err, errnoCode, ok, type RevisionsResult} from './errors.js';

export const RevisionStatusSchema = z.enum(['draft', 'validated', 'active', 'backup', 'discarded']);
export type RevisionStatus = z.infer<typeof RevisionStatusSchema>;

export const ConfigRevisionSchema = z
  .object({
    id: z.string().min(1),
    generation: z.number().int().gte(0),
    createdAt: z.string().datetime(),
    checksum: z.string().regex(/^[0-9a-f]{64}$/u),
    status: RevisionStatusSchema,
    path: z.string().min(1).optional(),
    reason: z.string().min(1).optional()
  })
  .strict();

export type ConfigRevision = z.infer<typeof ConfigRevisionSchema>;

export const LedgerSchema = z
  .object({
    version: z.literal(1),
    revisions: z.array(ConfigRevisionSchema)
  })
  .strict()
  .superRefine((ledger, ctx) => {
    const activeCount = ledger.revisions.filter(revision => revision.status === 'active').length;
    if (activeCount > 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `ledger holds ${activeCount} active revisions`,
        path: ['revisions']
      });
    }
  });

export type Ledger = z.infer<typeof LedgerSchema>;

export const ALLOWED_TRANSITIONS: Readonly<Record<RevisionStatus, readonly RevisionStatus[]>> = {
  draft: ['validated', 'discarded'],
  validated: ['active', 'discarded'],
  active: ['backup', 'discarded'],
  backup: ['active', 'discarded'],
  discarded: []
};

export const canTransition = (from: RevisionStatus, to: RevisionStatus) => ALLOWED_TRANSITIONS[from].includes(to);

export type TransitionChanges = {
  path?: string | undefined;
  reason?: string | undefined;
};

/** The only place a revision's status changes. */
export const transitionRevision = (
  revision: ConfigRevision,
  to: RevisionStatus,
  changes: TransitionChanges = {}
): RevisionsResult<ConfigRevision> => {
  if (!canTransition(revision.status, to)) {
    return err('invalid_transition', `revision ${revision.id} cannot move from ${revision.status} to ${to}`);
  }

  const next: ConfigRevision = {...revision, status: to};
  if ('path' in changes) {
    delete next.path;
    if (changes.path !== undefined) {
      next.path = changes.path;
    }
  }
  if ('reason' in changes) {
    delete next.reason;
    if (changes.reason !== undefined) {
      next.reason = changes.reason;
    }
  }
  return ok(next);
};

export const emptyLedger = (): Ledger => ({version: 1, revisions: []});

export const findActive = (ledger: Ledger) => ledger.revisions.find(revision => revision.status === 'active');

export const findRevision = (ledger: Ledger, id: string) => ledger.revisions.find(revision => revision.id === id);

export const nextGeneration = (ledger: Ledger) =>
  ledger.revisions.reduce((max, revision) => Math.max(max, revision.generation), -1) + 1;

export const revisionId = (generation: number) => `rev-${String(generation).padStart(4, '0')}`;

export const replaceRevision = (ledger: Ledger, revision: ConfigRevision): Ledger => ({
  ...ledger,
  revisions: ledger.revisions.map(existing => (existing.id === revision.id ? revision : existing))
});

export const loadLedger = async (path: string): Promise<RevisionsResult<Ledger | undefined>> => {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return ok(undefined);
    }
    return err('ledger_io_failed', `could not read ledger ${path}: ${describeError(error)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    return err('ledger_corrupt', `ledger ${path} is not valid JSON: ${describeError(error)}`);
  }

  const parsed = LedgerSchema.safeParse(raw);
  if (!parsed.success) {
    return err(
      'ledger_corrupt',
      `ledger ${path} is invalid: ${parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ')}`
    );
  }

  return ok(parsed.data);
};

export const saveLedger = async (path: string, ledger: Ledger): Promise<RevisionsResult<Ledger>> => {
  try {
    await replaceFileAtomically({path, content: `${JSON.stringify(ledger, null, 2)}\n`, mode: 0o600});
    return ok(ledger);
  } catch (error) {
    return err('ledger_io_failed', `could not write ledger ${path}: ${describeError(error)}`);
  }
};
