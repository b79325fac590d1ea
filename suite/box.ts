import { Err, Ok, type Operation, type Result } from "effection";

export function* box<T>(content: () => Operation<T>): Operation<Result<T>> {
  try {
    return Ok(yield* content());
  } catch (error) {
    return Err(error instanceof Error ? error : new Error(String(error)));
  }
}
