import { logger } from '../core/logger.js';

export type RaceWinner =
    | { kind: 'interrupt'; signal: string }
    | { kind: 'pool' }
    | { kind: 'reporter' };

export interface InterruptSource {
    /** Resolves with the name of the signal that interrupted the run. */
    promise: Promise<string>;
    dispose(): void;
}

export const INTERRUPT_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * Listens for process signals (when `signals` is non-empty) and for an
 * optional abort signal. Listeners are removed by `dispose`.
 */
export function listenForInterrupt(options: { signals?: NodeJS.Signals[]; abortSignal?: AbortSignal } = {}): InterruptSource {
    const signals = options.signals ?? INTERRUPT_SIGNALS;
    const cleanups: Array<() => void> = [];
    const promise = new Promise<string>((resolve) => {
        for (const signal of signals) {
            const handler = () => {
                logger.warn('arbiter: interrupt received', { signal });
                resolve(signal);
            };
            process.once(signal, handler);
            cleanups.push(() => process.removeListener(signal, handler));
        }
        const abortSignal = options.abortSignal;
        if (abortSignal) {
            if (abortSignal.aborted) {
                resolve('abort');
                return;
            }
            const onAbort = () => {
                logger.warn('arbiter: run aborted');
                resolve('abort');
            };
            abortSignal.addEventListener('abort', onAbort, { once: true });
            cleanups.push(() => abortSignal.removeEventListener('abort', onAbort));
        }
    });
    return {
        promise,
        dispose() {
            for (const cleanup of cleanups.splice(0)) {
                cleanup();
            }
        }
    };
}

/** Settles on whichever of interrupt, pool drain or reporter drain happens first. */
export function raceCompletion(
    interrupt: Promise<string>,
    poolDrained: Promise<void>,
    reporterDone: Promise<void>
): Promise<RaceWinner> {
    return Promise.race([
        interrupt.then((signal): RaceWinner => ({ kind: 'interrupt', signal })),
        poolDrained.then((): RaceWinner => ({ kind: 'pool' })),
        reporterDone.then((): RaceWinner => ({ kind: 'reporter' }))
    ]);
}

/** Waits for `promise`, giving up after `ms`; reports whether it settled in time. */
export function settleWithin(promise: Promise<unknown>, ms: number): Promise<boolean> {
    return new Promise((resolve) => {
        const timer = setTimeout(() => resolve(false), ms);
        void promise.then(
            () => {
                clearTimeout(timer);
                resolve(true);
            },
            () => {
                clearTimeout(timer);
                resolve(true);
            }
        );
    });
}
