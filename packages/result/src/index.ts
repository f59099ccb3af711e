// biome-ignore-all lint/performance/noBarrelFile: This is the package entry point
export type { Err, Ok, Result } from "./result.js";
export {
  err,
  fromPromise,
  map,
  mapErr,
  match,
  ok,
  unwrapOr,
} from "./result.js";
