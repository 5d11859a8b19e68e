// @filename: symbol.ts
/**
 * Extensions to the global Symbol constructor used by streams and their
 * cancelable handles.
 *
 * 1. `Symbol.observable`: lets foreign objects hand us an {@link Observable}
 *    through `Observable.from()`.
 * 2. `Symbol.dispose` / `Symbol.asyncDispose`: lets a {@link Cancelable} be
 *    bound with `using`, even on runtimes that predate explicit resource
 *    management.
 *
 * @example
 * ```ts
 * const interop = {
 *   [Symbol.observable]() {
 *     return Observable.of(1, 2, 3);
 *   }
 * };
 *
 * Observable.from(interop).subscribe(v => console.log(v));
 * ```
 *
 * @module
 */
export interface SymbolConstructor
  extends Omit<typeof globalThis.Symbol, "observable"> {
  /**
   * Well-known symbol for Observable interoperability.
   *
   * @see {@link https://github.com/tc39/proposal-observable | TC39 Observable proposal}
   */
  readonly observable: unique symbol;
}

/**
 * The global `Symbol`, typed with the extra well-known symbols.
 */
export const Symbol: SymbolConstructor = globalThis.Symbol as unknown as SymbolConstructor;

/**
 * Defines `name` on the global Symbol when the runtime lacks it.
 */
function ensureSymbol(name: "dispose" | "asyncDispose" | "observable"): void {
  if (typeof Reflect.get(Symbol, name) === "symbol") return;

  Reflect.defineProperty(Symbol, name, {
    value: globalThis.Symbol(`Symbol.${name}`),
    enumerable: false,
    configurable: false,
    writable: false,
  });
}

ensureSymbol("dispose");
ensureSymbol("asyncDispose");
ensureSymbol("observable");
