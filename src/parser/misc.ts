import { RunOptions } from "./types";

/**
 * defaultRunOptions
 */

export function defaultRunOptions<T>(): RunOptions<T> {
  return {
    tracer: null
  };
}
