import { Tracer } from "../utility";

export interface RunOptions<T> {
  tracer: Tracer<T> | null;
}

export type TokenTest<T> = (type: T) => boolean;
