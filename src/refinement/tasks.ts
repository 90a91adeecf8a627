import path from 'node:path';
import { getStyle } from '@/prompt/styles';
import { safeStyleName } from '@/util/filename';
import type { JobOverrides, RefinementSource, RefinementTask } from './types';

export interface TaskPlan {
    sources: readonly RefinementSource[];
    styles: readonly string[];
    language: string;
    outputDir: string;
    jobs?: ReadonlyMap<number, JobOverrides>;
}

export const outputFileName = (identity: string, styleId: string): string =>
    `${identity} [${safeStyleName(styleId)}].md`;

/**
 * Cross product of sources × styles. A source that belongs to a batch job
 * takes that job's styles, language and output subdirectory when set.
 */
export const createRefinementTasks = (plan: TaskPlan): RefinementTask[] => {
    const tasks: RefinementTask[] = [];
    const seen = new Set<string>();

    for (const source of plan.sources) {
        const overrides = source.jobId !== undefined ? plan.jobs?.get(source.jobId) : undefined;
        const styles = overrides?.styles && overrides.styles.length > 0 ? overrides.styles : plan.styles;
        const language = overrides?.language ?? plan.language;
        const directory = overrides?.outputSubdir ? path.join(plan.outputDir, overrides.outputSubdir) : plan.outputDir;

        for (const styleId of styles) {
            const id = `${source.identity}_${styleId}`;
            if (seen.has(id)) continue;
            seen.add(id);

            const style = getStyle(styleId);
            tasks.push({
                id,
                identity: source.identity,
                sourceDocumentRef: source.path,
                styleId,
                stylePromptTemplate: style.template,
                language,
                outputPath: path.join(directory, outputFileName(source.identity, styleId)),
                jobId: source.jobId,
            });
        }
    }
    return tasks;
};
