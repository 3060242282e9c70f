/**
 * Wrapping 8-bit sequence counter. Collisions are prevented by the dispatcher
 * refusing a second pending request with the same identity, not here.
 */
export class SequenceAllocator {
  private current = 0;

  next(): number {
    const value = this.current;
    this.current = (this.current + 1) & 0xFF;
    return value;
  }

  peek(): number {
    return this.current;
  }

  reset(): void {
    this.current = 0;
  }
}
