/**
 * Resultado tipado para operaciones que pueden fallar.
 *
 * Encaje en el sistema:
 * - Lo devuelven el gateway del catálogo (Mongo y memoria) y el servicio de
 *   import/export, para modelar errores sin `throw`.
 * - Distingue "no hay dato" (`Ok(null)`) de "falló la operación" (`Err(error)`).
 *
 * Contrato:
 * - `Err.unwrap()` **no lanza**: loguea y devuelve `undefined`. Los callers chequean
 *   `isErr()`/`isOk()` antes de usar `unwrap()`.
 *
 * Ejemplo:
 * ```ts
 * const res = await repo.findResourceByName("Water");
 * if (res.isErr()) return ErrResult(res.error);
 * const resource = res.unwrap();
 * ```
 */
export type Result<T, E = Error> = Ok<T, E> | Err<T, E>;

export class Ok<T, E> {
  readonly ok = true;
  readonly err = false;

  constructor(public readonly value: T) {}

  isOk(): this is Ok<T, E> {
    return true;
  }

  isErr(): this is Err<T, E> {
    return false;
  }

  unwrap(): T {
    return this.value;
  }

  map<U>(fn: (value: T) => U): Result<U, E> {
    return new Ok(fn(this.value));
  }

  mapErr<F>(_fn: (error: E) => F): Result<T, F> {
    return new Ok<T, F>(this.value);
  }
}

export class Err<T, E> {
  readonly ok = false;
  readonly err = true;

  constructor(public readonly error: E) {}

  isOk(): this is Ok<T, E> {
    return false;
  }

  isErr(): this is Err<T, E> {
    return true;
  }

  /**
   * A diferencia de Rust, **no lanza**: loguea un warning y devuelve `undefined`.
   * Usar solo después de validar `isOk()`.
   */
  unwrap(): T {
    console.warn("Result.unwrap called on Err; returning undefined fallback.", this.error);
    return undefined as unknown as T;
  }

  map<U>(_fn: (value: T) => U): Result<U, E> {
    return new Err<U, E>(this.error);
  }

  mapErr<F>(fn: (error: E) => F): Result<T, F> {
    return new Err<T, F>(fn(this.error));
  }
}

/** Crea un resultado exitoso. */
export const OkResult = <T, E = Error>(value: T): Result<T, E> => new Ok(value);

/** Crea un resultado fallido. */
export const ErrResult = <T, E = Error>(error: E): Result<T, E> => new Err(error);

/** Normaliza cualquier valor lanzado a `Error`. */
export const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));
