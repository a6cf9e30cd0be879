export class Success<S, F = never> {
  constructor(private readonly value: S) {}

  isSuccess(): this is Success<S, F> {
    return true;
  }

  isFailure(): this is Failure<S, F> {
    return false;
  }

  getValue(): S {
    return this.value;
  }
}

export class Failure<S, F> {
  constructor(private readonly error: F) {}

  isSuccess(): this is Success<S, F> {
    return false;
  }

  isFailure(): this is Failure<S, F> {
    return true;
  }

  getError(): F {
    return this.error;
  }
}

export type Either<S, F> = Success<S, F> | Failure<S, F>;

export function success<S, F = never>(value: S): Either<S, F> {
  return new Success<S, F>(value);
}

export function failure<F, S = never>(error: F): Either<S, F> {
  return new Failure<S, F>(error);
}
