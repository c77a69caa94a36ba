/**
 * Stack-safe recursion for forest walks. A `Task` is a generator that yields
 * the sub-tasks it depends on; results travel through `Out` boxes. `runTask`
 * drives the tasks on an explicit frame stack, so traversal depth is bounded by
 * the heap instead of the call stack.
 */

export type Task = Generator<Task, void, undefined>;

export interface Out<T> {
  value: T;
}

export function out<T>(value: T): Out<T> {
  return { value };
}

/** Run `task` and every sub-task it yields to completion. Errors unwind through the frames like native throws. */
export function runTask(task: Task): void {
  const stack: Task[] = [task];
  let pending: { error: unknown } | null = null;

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    let step: IteratorResult<Task, void>;
    try {
      step = pending ? frame.throw(pending.error) : frame.next();
      pending = null;
    } catch (error) {
      stack.pop();
      pending = { error };
      continue;
    }
    if (step.done) {
      stack.pop();
    } else {
      stack.push(step.value);
    }
  }

  if (pending) throw pending.error;
}
