import type { Server } from "../types/hetzner.js";

export type MenuState = { screen: "main" } | { screen: "server"; server: Server } | { screen: "exited" };

export type MenuScreen = MenuState["screen"];

export type MenuEvent =
  | { type: "select-server"; server: Server }
  | { type: "back" }
  | { type: "refresh" }
  | { type: "quit" };

export type MenuEventType = MenuEvent["type"];

export class InvalidTransitionError extends Error {
  constructor(
    public readonly from: MenuScreen,
    public readonly event: MenuEventType
  ) {
    super(`Cannot handle "${event}" on the ${from} screen`);
    this.name = "InvalidTransitionError";
  }
}

/**
 * Two-screen menu: `main` lists servers, `server` manages one server's
 * snapshots, `exited` is terminal.
 */
export class MenuStateMachine {
  private static readonly TRANSITIONS: ReadonlyMap<MenuScreen, ReadonlyMap<MenuEventType, MenuScreen>> = new Map([
    [
      "main",
      new Map<MenuEventType, MenuScreen>([
        ["select-server", "server"],
        ["refresh", "main"],
        ["quit", "exited"]
      ])
    ],
    [
      "server",
      new Map<MenuEventType, MenuScreen>([
        ["back", "main"],
        ["refresh", "server"],
        ["quit", "exited"]
      ])
    ],
    ["exited", new Map<MenuEventType, MenuScreen>()]
  ]);

  static readonly initial: MenuState = { screen: "main" };

  static canTransition(from: MenuScreen, event: MenuEventType): boolean {
    return this.TRANSITIONS.get(from)?.has(event) ?? false;
  }

  static transition(state: MenuState, event: MenuEvent): MenuState {
    if (!this.canTransition(state.screen, event.type)) {
      throw new InvalidTransitionError(state.screen, event.type);
    }
    switch (event.type) {
      case "select-server":
        return { screen: "server", server: event.server };
      case "back":
        return { screen: "main" };
      case "refresh":
        return state;
      case "quit":
        return { screen: "exited" };
    }
  }

  static isTerminal(state: MenuState): state is Extract<MenuState, { screen: "exited" }> {
    return state.screen === "exited";
  }
}
