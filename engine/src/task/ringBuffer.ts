/** Bounded FIFO of the most recent lines; the oldest line is evicted first. */
export class LineRing {
    private readonly lines: string[] = [];

    // storage grows with the lines pushed, not with the capacity
    constructor(private readonly capacity: number) {}

    push(line: string): void {
        if (this.capacity <= 0) return;
        this.lines.push(line);
        if (this.lines.length > this.capacity) {
            this.lines.shift();
        }
    }

    /** Lines in arrival order (returns a copy). */
    read(): string[] {
        return [...this.lines];
    }
}
