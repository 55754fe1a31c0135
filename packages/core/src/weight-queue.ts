/**
 * Min-weight queue
 *
 * Binary heap ordered by weight, then by insertion sequence. Equal weights
 * leave in the order they were inserted, which keeps tree shape (and so the
 * compressed bytes) reproducible.
 */

interface WeightQueueNode<T> {
  item: T;
  weight: number;
  sequence: number;
}

export class MinWeightQueue<T> {
  private heap: WeightQueueNode<T>[] = [];
  private nextSequence = 0;

  insert(item: T, weight: number): void {
    this.heap.push({ item, weight, sequence: this.nextSequence++ });
    this.heapifyUp(this.heap.length - 1);
  }

  extractMin(): T | null {
    if (this.heap.length === 0) return null;

    const min = this.heap[0];
    const last = this.heap.pop();

    if (this.heap.length > 0 && last) {
      this.heap[0] = last;
      this.heapifyDown(0);
    }

    return min.item;
  }

  peek(): T | null {
    return this.heap.length > 0 ? this.heap[0].item : null;
  }

  size(): number {
    return this.heap.length;
  }

  isEmpty(): boolean {
    return this.heap.length === 0;
  }

  private precedes(a: WeightQueueNode<T>, b: WeightQueueNode<T>): boolean {
    if (a.weight !== b.weight) {
      return a.weight < b.weight;
    }
    return a.sequence < b.sequence;
  }

  private heapifyUp(index: number): void {
    while (index > 0) {
      const parentIndex = Math.floor((index - 1) / 2);
      if (!this.precedes(this.heap[index], this.heap[parentIndex])) break;

      this.heapSwap(parentIndex, index);
      index = parentIndex;
    }
  }

  private heapifyDown(index: number): void {
    while (true) {
      let minIndex = index;
      const leftChild = 2 * index + 1;
      const rightChild = 2 * index + 2;

      if (
        leftChild < this.heap.length &&
        this.precedes(this.heap[leftChild], this.heap[minIndex])
      ) {
        minIndex = leftChild;
      }

      if (
        rightChild < this.heap.length &&
        this.precedes(this.heap[rightChild], this.heap[minIndex])
      ) {
        minIndex = rightChild;
      }

      if (minIndex === index) break;

      this.heapSwap(index, minIndex);
      index = minIndex;
    }
  }

  private heapSwap(i: number, j: number): void {
    const temp = this.heap[i];
    this.heap[i] = this.heap[j];
    this.heap[j] = temp;
  }
}
