import type { Command } from 'commander';
import { printJson, requireProject } from '../cli-shared.js';
import { listTimelineEvents } from '../../timeline/emitter.js';
import { PIPELINE_SUBJECT_TYPE } from '../../timeline/pipeline-events.js';
import { requireRun } from '../../pipeline/registry.js';

export function registerEventsCommand(program: Command): void {
  program
    .command('events <ref>')
    .description('Show timeline events for a pipeline run (or any subject with --subject-type)')
    .option('--subject-type <type>', 'Subject type; <ref> is then the subject id')
    .option('--audience <audience>', 'all or finance', 'finance')
    .option('--json', 'Print as JSON', false)
    .action((ref: string, opts) => {
      const { db } = requireProject();
      const subjectType = (opts.subjectType as string | undefined) ?? PIPELINE_SUBJECT_TYPE;
      const subjectId = opts.subjectType ? ref : requireRun(db, ref).id;
      const events = listTimelineEvents(db, {
        subject_type: subjectType,
        subject_id: subjectId,
        audience: opts.audience === 'all' ? 'all' : 'finance',
      });
      if (opts.json) {
        printJson(events);
        return;
      }
      if (events.length === 0) {
        console.log('No events found.');
        return;
      }
      for (const ev of events) {
        console.log(`  ${ev.occurred_at}  ${ev.event_type}  (${ev.visibility})`);
      }
    });
}
