import { ConsoleError, toErrorMessage } from "../../shared/errors";
import type { ConnectionConfig, DownloadDestination } from "../../shared/types";
import {
  initialSessionState,
  transition,
  type SessionCommand,
  type SessionEffect,
  type SessionEvent,
  type SessionNotice,
  type SessionResult,
  type SessionState,
  type UploadSource,
} from "./session-machine";

export interface StorageGateway {
  authenticateAndListBuckets(config: ConnectionConfig): Promise<string[]>;
  /** Resolves to the refreshed bucket listing, or null when it could not be fetched. */
  createBucket(name: string): Promise<string[] | null>;
  listObjects(bucket: string): Promise<string[]>;
  uploadObject(bucket: string, source: UploadSource): Promise<string>;
  downloadObject(bucket: string, key: string, destination: DownloadDestination): Promise<string>;
  deleteObject(bucket: string, key: string): Promise<void>;
  endSession(): Promise<void>;
}

export type SessionSnapshot = {
  state: SessionState;
  busy: boolean;
  notice: SessionNotice | null;
};

// Commands that never start an external call stay available while one is in flight.
const LOCAL_COMMANDS: ReadonlySet<SessionCommand["type"]> = new Set<SessionCommand["type"]>([
  "disconnect",
  "selectDeleteTarget",
  "setDeleteConfirmed",
]);

const toConsoleError = (error: unknown): ConsoleError => {
  if (error instanceof ConsoleError) {
    return error;
  }

  return new ConsoleError(toErrorMessage(error), "ProviderError", "Other");
};

export class SessionController {
  private readonly gateway: StorageGateway;
  private readonly listeners = new Set<() => void>();
  private snapshot: SessionSnapshot = {
    state: initialSessionState(),
    busy: false,
    notice: null,
  };
  private generation = 0;

  constructor(gateway: StorageGateway) {
    this.gateway = gateway;
  }

  getSnapshot = (): SessionSnapshot => this.snapshot;

  getState(): SessionState {
    return this.snapshot.state;
  }

  subscribe = (listener: () => void): (() => void) => {
    this.listeners.add(listener);

    return () => {
      this.listeners.delete(listener);
    };
  };

  dismissNotice(): void {
    if (!this.snapshot.notice) {
      return;
    }

    this.update({ notice: null });
  }

  /**
   * Applies a command and performs every effect it leads to. Resolves once the
   * session has settled; collaborator failures are surfaced as notices and
   * never reject.
   */
  async dispatch(command: SessionCommand): Promise<void> {
    if (this.snapshot.busy && !LOCAL_COMMANDS.has(command.type)) {
      this.update({ notice: { level: "info", message: "Another operation is still running" } });
      return;
    }

    if (command.type === "disconnect") {
      this.generation += 1;
    }

    const generation = this.generation;
    const effects = this.apply(command);

    if (!effects.length) {
      return;
    }

    this.update({ busy: true });

    try {
      await this.runEffects(effects, generation);
    } finally {
      if (generation === this.generation) {
        this.update({ busy: false });
      }
    }
  }

  private async runEffects(effects: SessionEffect[], generation: number): Promise<void> {
    const queue = [...effects];

    while (queue.length) {
      const effect = queue.shift();

      if (!effect) {
        continue;
      }

      const result = await this.perform(effect);

      if (generation !== this.generation) {
        if (result.type === "connectSucceeded") {
          await this.endLateSession();
        }

        return;
      }

      queue.push(...this.apply(result));
    }
  }

  // A login that completes after a disconnect has left a session on the server.
  private async endLateSession(): Promise<void> {
    try {
      await this.gateway.endSession();
    } catch (error) {
      this.update({
        notice: {
          level: "error",
          message: `Disconnected locally, but the server session could not be closed: ${toErrorMessage(error)}`,
          error: toConsoleError(error),
        },
      });
    }
  }

  private apply(event: SessionEvent): SessionEffect[] {
    const result = transition(this.snapshot.state, event);

    if (result.state !== this.snapshot.state || result.notice) {
      this.update({
        state: result.state,
        notice: result.notice ?? this.snapshot.notice,
      });
    }

    return result.effects;
  }

  private async perform(effect: SessionEffect): Promise<SessionResult> {
    switch (effect.type) {
      case "authenticate":
        try {
          const bucketNames = await this.gateway.authenticateAndListBuckets(effect.config);
          return { type: "connectSucceeded", bucketNames };
        } catch (error) {
          return { type: "connectFailed", error: toConsoleError(error) };
        }

      case "createBucket":
        try {
          const bucketNames = await this.gateway.createBucket(effect.name);
          return { type: "bucketCreated", name: effect.name, bucketNames };
        } catch (error) {
          return { type: "createBucketFailed", name: effect.name, error: toConsoleError(error) };
        }

      case "listObjects":
        try {
          const files = await this.gateway.listObjects(effect.bucket);
          return { type: "filesLoaded", bucket: effect.bucket, files };
        } catch (error) {
          return { type: "filesFailed", bucket: effect.bucket, error: toConsoleError(error) };
        }

      case "uploadObject":
        try {
          const key = await this.gateway.uploadObject(effect.bucket, effect.source);
          return { type: "uploadSucceeded", bucket: effect.bucket, key };
        } catch (error) {
          return {
            type: "uploadFailed",
            bucket: effect.bucket,
            name: effect.source.name,
            error: toConsoleError(error),
          };
        }

      case "downloadObject":
        try {
          const path = await this.gateway.downloadObject(
            effect.bucket,
            effect.key,
            effect.destination,
          );
          return { type: "downloadSucceeded", bucket: effect.bucket, key: effect.key, path };
        } catch (error) {
          return {
            type: "downloadFailed",
            bucket: effect.bucket,
            key: effect.key,
            error: toConsoleError(error),
          };
        }

      case "deleteObject":
        try {
          await this.gateway.deleteObject(effect.bucket, effect.key);
          return { type: "fileDeleted", bucket: effect.bucket, key: effect.key };
        } catch (error) {
          return {
            type: "deleteFailed",
            bucket: effect.bucket,
            key: effect.key,
            error: toConsoleError(error),
          };
        }

      case "endSession":
        try {
          await this.gateway.endSession();
          return { type: "sessionEnded" };
        } catch (error) {
          return { type: "endSessionFailed", error: toConsoleError(error) };
        }
    }
  }

  private update(patch: Partial<SessionSnapshot>): void {
    this.snapshot = { ...this.snapshot, ...patch };

    for (const listener of this.listeners) {
      listener();
    }
  }
}
