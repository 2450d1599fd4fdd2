/**
 * @module options/peeking-iterator
 * @description An iterator with one element of lookahead.
 */

export class PeekingIterator<E> implements Iterator<E> {
  private buffered: IteratorResult<E> | null = null;

  constructor(private readonly source: Iterator<E>) {}

  static of<E>(items: Iterable<E>): PeekingIterator<E> {
    return new PeekingIterator(items[Symbol.iterator]());
  }

  /** The next element without consuming it, or undefined at the end. */
  peek(): E | undefined {
    const result = this.fill();
    return result.done ? undefined : result.value;
  }

  hasNext(): boolean {
    return !this.fill().done;
  }

  next(): IteratorResult<E> {
    const result = this.fill();
    this.buffered = null;
    return result;
  }

  [Symbol.iterator](): PeekingIterator<E> {
    return this;
  }

  private fill(): IteratorResult<E> {
    if (this.buffered === null) {
      this.buffered = this.source.next();
    }
    return this.buffered;
  }
}
