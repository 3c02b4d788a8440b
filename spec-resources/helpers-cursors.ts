import { assertExists } from "@src/utils/assert";

import type { UndefOr } from "@src/utils/utility-types";
import type { InputCursor, BidirectionalCursor, ForwardCursor, Range } from "@src/cursors";

interface ListNode<T> {
  value: T;
  prev: UndefOr<ListNode<T>>;
  next: UndefOr<ListNode<T>>;
}

/**
 * A bare-bones doubly-linked list.  It has no random access, so it is
 * good for proving an algorithm gets by with the cursors it asks for.
 */
export interface MockList<T> {
  head: UndefOr<ListNode<T>>;
  tail: UndefOr<ListNode<T>>;
}

/** A cursor into a {@link MockList}; the end cursor has no node. */
class ListCursor<T> implements BidirectionalCursor<T> {
  constructor(
    readonly list: MockList<T>,
    readonly node: UndefOr<ListNode<T>>
  ) {
    Object.freeze(this);
  }

  read(): T {
    return assertExists("Cannot read the end of a list.", this.node).value;
  }

  write(value: T): void {
    assertExists("Cannot write the end of a list.", this.node).value = value;
  }

  next(): ListCursor<T> {
    const node = assertExists("Cannot advance past the end of a list.", this.node);
    return new ListCursor(this.list, node.next);
  }

  prev(): ListCursor<T> {
    if (!this.node) return new ListCursor(this.list, this.list.tail);
    return new ListCursor(this.list, this.node.prev);
  }

  equals(other: InputCursor<T>): boolean {
    if (!(other instanceof ListCursor)) return false;
    return other.list === this.list && other.node === this.node;
  }
}

/** Builds a linked list holding the given values. */
export const mockList = <T>(values: readonly T[]): MockList<T> => {
  const list: MockList<T> = { head: undefined, tail: undefined };
  for (const value of values) {
    const node: ListNode<T> = { value, prev: list.tail, next: undefined };
    if (list.tail) list.tail.next = node;
    else list.head = node;
    list.tail = node;
  }
  return list;
};

/** Reads every value out of a linked list, in order. */
export const listValues = <T>(list: MockList<T>): T[] => {
  const result: T[] = [];
  for (let node = list.head; node; node = node.next) result.push(node.value);
  return result;
};

/** Gets a bidirectional `[begin, end)` range over a linked list. */
export const listRange = <T>(list: MockList<T>): Range<BidirectionalCursor<T>> =>
  [new ListCursor(list, list.head), new ListCursor(list, undefined)];

/**
 * Gets a `[begin, end)` range over a linked list that is typed as
 * forward-only.
 */
export const forwardRange = <T>(list: MockList<T>): Range<ForwardCursor<T>> =>
  listRange(list);

