// Monotonic integer ids for mirrors, links and actions.
// One generator is owned by each simulation and threaded through constructors.
export class IdGenerator {
  private next: number;

  constructor(start = 0) {
    this.next = start;
  }

  nextId(): number {
    const id = this.next;
    this.next += 1;
    return id;
  }

  peek(): number {
    return this.next;
  }
}
