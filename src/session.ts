import type {
  ExecutionSurface,
  Notifier,
  SessionOutcome,
  SessionState,
  SurfaceFactory,
} from "./types.js";
import { TRANSFER_TOOL, toCommandLine } from "./command.js";
import { log } from "./diagnostics.js";

const SURFACE_TITLE = `${TRANSFER_TOOL} upload`;

const TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
  idle: ["launching"],
  launching: ["running", "failed"],
  running: ["succeeded", "failed"],
  succeeded: [],
  failed: [],
};

/**
 * One supervised run of the transfer tool. `completion` never rejects.
 */
export class TransferSession {
  private currentState: SessionState = "idle";
  private resolveCompletion: (outcome: SessionOutcome) => void = () => {};
  readonly completion = new Promise<SessionOutcome>((resolve) => {
    this.resolveCompletion = resolve;
  });

  constructor(readonly argv: readonly string[]) {}

  get state(): SessionState {
    return this.currentState;
  }

  transition(next: SessionState): void {
    if (!TRANSITIONS[this.currentState].includes(next)) {
      throw new Error(`Invalid session transition ${this.currentState} -> ${next}`);
    }
    this.currentState = next;
  }

  settle(outcome: SessionOutcome): void {
    this.transition(outcome.state);
    this.resolveCompletion(outcome);
  }
}

export class TransferSupervisor {
  constructor(
    private readonly surfaces: SurfaceFactory,
    private readonly notifier: Notifier
  ) {}

  run(
    argv: readonly string[],
    onSuccess?: () => void | Promise<void>
  ): TransferSession {
    const session = new TransferSession(argv);
    const commandLine = toCommandLine(argv);

    session.transition("launching");
    let surface: ExecutionSurface;
    try {
      surface = this.surfaces.create({ title: SURFACE_TITLE, commandLine });
    } catch (err) {
      const message = `Could not open a terminal for ${TRANSFER_TOOL}: ${
        err instanceof Error ? err.message : String(err)
      }`;
      this.notifier.notify(message, "error");
      session.settle({
        state: "failed",
        error: { category: "SURFACE_FAILED", message },
      });
      return session;
    }

    session.transition("running");
    log(`Transfer started: ${commandLine}`);

    void surface.exit
      .then((code) => this.finish(session, code, onSuccess))
      .catch((err: unknown) => {
        const message = `${TRANSFER_TOOL} session ended unexpectedly: ${
          err instanceof Error ? err.message : String(err)
        }`;
        this.notifier.notify(message, "error");
        session.settle({
          state: "failed",
          error: { category: "TRANSFER_FAILED", message },
        });
      });

    return session;
  }

  private async finish(
    session: TransferSession,
    code: number,
    onSuccess?: () => void | Promise<void>
  ): Promise<void> {
    if (code !== 0) {
      const message = `${TRANSFER_TOOL} exited with code ${code}`;
      this.notifier.notify(message, "error");
      session.settle({
        state: "failed",
        exitCode: code,
        error: { category: "TRANSFER_FAILED", message, exitCode: code },
      });
      return;
    }

    this.notifier.notify(`${TRANSFER_TOOL} completed successfully`, "info");
    if (onSuccess) {
      try {
        await onSuccess();
      } catch (err) {
        this.notifier.notify(
          `Post-transfer step failed: ${err instanceof Error ? err.message : String(err)}`,
          "warning"
        );
      }
    }
    session.settle({ state: "succeeded", exitCode: 0 });
  }
}
