/**
 * Notification batching: one mail per new item, or a single digest.
 *
 * A group that does not ask for digests still gets one when a poll turns up
 * more new items than `maxMailsPerCheck`, so a feed that suddenly republishes
 * its whole archive cannot flood the recipients.
 */

import type { CompiledTemplate } from './adapters.js';
import type { EntryContext, Feed } from './feed-types.js';

export type NotificationPlan =
  | { kind: 'none' }
  | { kind: 'items'; entries: EntryContext[] }
  | { kind: 'digest'; entries: EntryContext[] };

export interface BatchPolicy {
  digest: boolean;
  maxMailsPerCheck: number;
}

export interface MailTemplates {
  itemSubject: CompiledTemplate;
  itemBody: CompiledTemplate;
  digestSubject: CompiledTemplate;
  digestBody: CompiledTemplate;
}

export interface RenderedMail {
  subject: string;
  html: string;
}

export function planNotifications(entries: readonly EntryContext[], policy: BatchPolicy): NotificationPlan {
  if (entries.length === 0) return { kind: 'none' };
  if (!policy.digest && entries.length <= policy.maxMailsPerCheck) {
    return { kind: 'items', entries: [...entries] };
  }
  return { kind: 'digest', entries: [...entries] };
}

/** Mail subjects are single-line. */
function subjectLine(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Render a plan into mails. Item templates see `{ feed, item }`; digest
 * templates see every fetched feed of the group as `feeds` and the new
 * entries as `items`. Throws RenderError.
 */
export function renderNotifications(
  plan: NotificationPlan,
  templates: MailTemplates,
  feeds: readonly Feed[],
  templateArgs: Readonly<Record<string, unknown>>,
): RenderedMail[] {
  switch (plan.kind) {
    case 'none':
      return [];
    case 'items':
      return plan.entries.map((entry) => {
        const context = { ...entry, template_args: templateArgs };
        return {
          subject: subjectLine(templates.itemSubject.render(context)),
          html: templates.itemBody.render(context),
        };
      });
    case 'digest': {
      const context = { feeds, items: plan.entries, template_args: templateArgs };
      return [{
        subject: subjectLine(templates.digestSubject.render(context)),
        html: templates.digestBody.render(context),
      }];
    }
  }
}

/** Newest first by `updated`, falling back to `published`; undated entries last. */
export function sortByLastModified(entries: readonly EntryContext[]): EntryContext[] {
  const stamp = (entry: EntryContext): number => {
    const value = entry.item.updated ?? entry.item.published;
    return value ? Date.parse(value) : Number.NEGATIVE_INFINITY;
  };
  return [...entries].sort((a, b) => stamp(b) - stamp(a));
}
