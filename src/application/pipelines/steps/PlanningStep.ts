/**
 * Planning step - builds the composition spec.
 * Not retried: a planning failure means the inputs cannot be laid out.
 */

import { PipelineStep, JobContext, requireValue, toStageError } from '../PipelineInfrastructure';
import { CompositionPlanner } from '../../CompositionPlanner';

export class PlanningStep implements PipelineStep {
    readonly name = 'Planning';
    readonly status = 'planning';

    constructor(
        private readonly planner: CompositionPlanner,
        private readonly popupSoundPath: string | null
    ) { }

    async execute(context: JobContext): Promise<JobContext> {
        try {
            const selection = requireValue(context.selection, 'background selection', this.name);
            const composition = this.planner.plan({
                variant: context.job.variant,
                durationSeconds: requireValue(context.durationSeconds, 'duration', this.name),
                narrationPath: requireValue(context.narrationPath, 'narration path', this.name),
                images: requireValue(context.imagePaths, 'image paths', this.name),
                captions: context.captions ?? [],
                clipPath: selection.clipPath,
                clipWindow: requireValue(context.clipWindow, 'clip window', this.name),
                musicPath: selection.musicPath,
                popupSoundPath: this.popupSoundPath,
            });
            return { ...context, composition };
        } catch (error: unknown) {
            throw toStageError('PlanningError', error);
        }
    }
}
