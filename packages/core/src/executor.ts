/**
 * runs a unit of work on some execution context
 *
 * the token cache owns no scheduler of its own; callers hand it an executor
 * that decides where the refresh operation starts
 */
export interface Executor {
  /**
   * schedules a task
   * @param task work to run
   */
  execute(task: () => void): void;
}

/** runs each task inline on the calling stack */
export const directExecutor: Executor = {
  execute: (task) => task(),
};

/** defers each task to the macrotask queue */
export const asyncExecutor: Executor = {
  execute: (task) => {
    setImmediate(task);
  },
};
