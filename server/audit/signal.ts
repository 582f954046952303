import type { Signal } from "./types";

export function present<T>(value: T): Signal<T> {
  return { status: "present", value };
}

export function absent<T>(reason: string): Signal<T> {
  return { status: "absent", reason };
}

export function mapSignal<T, U>(signal: Signal<T>, fn: (value: T) => U): Signal<U> {
  return signal.status === "present" ? present(fn(signal.value)) : absent(signal.reason);
}

