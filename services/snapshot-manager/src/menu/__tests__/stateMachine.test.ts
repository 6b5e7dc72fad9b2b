import { describe, expect, it } from "vitest";
import { InvalidTransitionError, MenuStateMachine, type MenuState } from "../stateMachine.js";

const server = { id: 1, name: "web-01", status: "running" };

describe("MenuStateMachine", () => {
  it("starts on the main screen", () => {
    expect(MenuStateMachine.initial).toEqual({ screen: "main" });
  });

  it("enters the server screen on selection and returns on back", () => {
    const selected = MenuStateMachine.transition(MenuStateMachine.initial, { type: "select-server", server });
    expect(selected).toEqual({ screen: "server", server });
    expect(MenuStateMachine.transition(selected, { type: "back" })).toEqual({ screen: "main" });
  });

  it("keeps the current screen on refresh", () => {
    const serverState: MenuState = { screen: "server", server };
    expect(MenuStateMachine.transition(serverState, { type: "refresh" })).toBe(serverState);
    expect(MenuStateMachine.transition({ screen: "main" }, { type: "refresh" })).toEqual({ screen: "main" });
  });

  it("exits from either screen on quit", () => {
    expect(MenuStateMachine.transition({ screen: "main" }, { type: "quit" })).toEqual({ screen: "exited" });
    expect(MenuStateMachine.transition({ screen: "server", server }, { type: "quit" })).toEqual({ screen: "exited" });
    expect(MenuStateMachine.isTerminal({ screen: "exited" })).toBe(true);
    expect(MenuStateMachine.isTerminal({ screen: "main" })).toBe(false);
    expect(MenuStateMachine.isTerminal({ screen: "server", server })).toBe(false);
  });

  it("rejects transitions outside the table", () => {
    expect(MenuStateMachine.canTransition("main", "back")).toBe(false);
    expect(MenuStateMachine.canTransition("server", "select-server")).toBe(false);
    expect(() => MenuStateMachine.transition({ screen: "main" }, { type: "back" })).toThrow(InvalidTransitionError);
    expect(() => MenuStateMachine.transition({ screen: "exited" }, { type: "refresh" })).toThrow(
      'Cannot handle "refresh" on the exited screen'
    );
  });
});
