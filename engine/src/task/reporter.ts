import type { Renderer } from '../render/dashboard.js';
import type { TaskRegistry } from './registry.js';
import type { TaskEvent } from './types.js';

/**
 * Sole consumer of worker events and sole writer of the registry. Redraws
 * after every event and draws the final state once the last task completes.
 */
export class Reporter {
    private remainingCount: number;
    private detached = false;

    constructor(private readonly registry: TaskRegistry, private readonly renderer: Renderer) {
        this.remainingCount = registry.size;
    }

    get remaining() {
        return this.remainingCount;
    }

    /** Stops drawing; events are still applied until the channel closes. */
    detach() {
        this.detached = true;
    }

    async run(events: AsyncIterable<TaskEvent>): Promise<void> {
        if (this.remainingCount === 0) {
            this.renderer.finish(this.registry.snapshot());
        } else {
            this.renderer.begin();
            this.renderer.render(this.registry.snapshot());
        }
        for await (const event of events) {
            const wasRemaining = this.remainingCount;
            if (this.registry.apply(event)) {
                this.remainingCount -= 1;
            }
            if (this.detached) continue;
            if (this.remainingCount === 0 && wasRemaining > 0) {
                this.renderer.finish(this.registry.snapshot());
            } else if (this.remainingCount > 0) {
                this.renderer.render(this.registry.snapshot());
            }
        }
    }
}
