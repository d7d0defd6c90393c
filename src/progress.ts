import type { EnumerationOptions } from './types/options.js';

export type ProgressCallback = NonNullable<EnumerationOptions['onProgress']>;

/**
 * The part of an ora spinner the progress callback drives
 */
export interface ProgressDisplay {
    text: string;
    render(): unknown;
}

/**
 * Progress callback that redraws the spinner on every update.
 * Enumeration runs synchronously, so the spinner's own timer never fires
 * until the run is over.
 */
export function spinnerProgress(display: ProgressDisplay): ProgressCallback {
    return (progress, message) => {
        display.text = progress === undefined ? message : `${message} [${Math.round(progress * 100)}%]`;
        display.render();
    };
}
