import { cleanFilename, uniqueName } from '@/util/filename';
import type { AcquisitionTask, SourceDescriptor } from './types';

/**
 * Give every descriptor a stable identity. Two sources with the same title
 * become `title`, `title_2`, ... in input order.
 */
export const assignIdentities = (descriptors: readonly SourceDescriptor[]): AcquisitionTask[] => {
    const taken = new Set<string>();
    return descriptors.map((descriptor) => {
        const id = uniqueName(cleanFilename(descriptor.displayTitle), (candidate) => taken.has(candidate));
        taken.add(id);
        return { ...descriptor, id };
    });
};
