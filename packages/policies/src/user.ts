import type { Request } from "@worldtalk/schemas";
import { say } from "@worldtalk/schemas";
import type { PolicyOutcome } from "./context.js";
import type { DialogueView } from "./goals.js";

/** The user states its request once, on its first turn, and stays silent afterwards. */
export class UserPolicy {
  readonly player: string;
  readonly request: Request;

  constructor(player: string, request: Request) {
    this.player = player;
    this.request = request;
  }

  respond(view: DialogueView): PolicyOutcome | null {
    if (view.utterances.some((u) => u.speaker === this.player)) return null;
    return { steps: [say(this.player, { kind: "request", request: this.request })], goal: null };
  }
}
