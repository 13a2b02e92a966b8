/**
 * Host callables registered in the global scope of every interpreter.
 */
import type { NativeFn } from "./values.js";
import { render } from "./values.js";

export const say: NativeFn = {
  kind: "native",
  name: "say",
  arity: 1,
  call([value = null], host) {
    host.output(render(value));
    return null;
  },
};

export const BUILTIN_NATIVES: readonly NativeFn[] = [say];
