import { describe, expect, it } from "vitest";
import type { TUIEvent } from "../tui/matrix-tui-types.js";
import { MatrixEventEmitter } from "./event-emitter.js";

describe("MatrixEventEmitter", () => {
  it("replays events emitted before anyone subscribed", () => {
    const emitter = new MatrixEventEmitter();
    emitter.emit({ type: "start", total: 1, tests: 1, compilers: 1 });
    emitter.emit({ type: "job", testName: "impl_auto", compiler: "GCC" });

    const seen: TUIEvent["type"][] = [];
    emitter.on((event) => seen.push(event.type));
    emitter.emit({ type: "warning", message: "slow" });

    expect(seen).toEqual(["start", "job", "warning"]);
  });

  it("replays the backlog only once", () => {
    const emitter = new MatrixEventEmitter();
    emitter.emit({ type: "warning", message: "early" });

    const first: string[] = [];
    const second: string[] = [];
    emitter.on((event) => first.push(event.type));
    emitter.on((event) => second.push(event.type));

    expect(first).toEqual(["warning"]);
    expect(second).toEqual([]);
  });

  it("stops delivering after unsubscribe", () => {
    const emitter = new MatrixEventEmitter();
    const seen: string[] = [];
    const unsubscribe = emitter.on((event) => seen.push(event.type));

    emitter.emit({ type: "warning", message: "one" });
    unsubscribe();
    emitter.emit({ type: "warning", message: "two" });

    expect(seen).toEqual(["warning"]);
  });
});
