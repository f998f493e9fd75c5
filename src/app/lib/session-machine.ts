import { validateBucketName } from "../../shared/bucket-name";
import { ConsoleError } from "../../shared/errors";
import type { ConnectionConfig, DownloadDestination } from "../../shared/types";

export type SessionPhase = "disconnected" | "connecting" | "connected";

export type FilesStatus = "idle" | "loading" | "loaded" | "failed";

export type SessionState = {
  phase: SessionPhase;
  config: ConnectionConfig | null;
  bucketNames: string[];
  currentBucket: string | null;
  currentFiles: string[];
  filesStatus: FilesStatus;
  pendingDeleteTarget: string | null;
  deleteConfirmed: boolean;
};

export type UploadSource = {
  name: string;
  body: Blob;
};

export type SessionCommand =
  | { type: "connect"; config: ConnectionConfig }
  | { type: "disconnect" }
  | { type: "selectBucket"; bucket: string }
  | { type: "createBucket"; name: string }
  | { type: "selectDeleteTarget"; key: string }
  | { type: "setDeleteConfirmed"; confirmed: boolean }
  | { type: "deleteFile" }
  | { type: "refreshFiles" }
  | { type: "uploadFile"; source: UploadSource }
  | { type: "downloadFile"; key: string; destination: DownloadDestination };

export type SessionResult =
  | { type: "connectSucceeded"; bucketNames: string[] }
  | { type: "connectFailed"; error: ConsoleError }
  | { type: "filesLoaded"; bucket: string; files: string[] }
  | { type: "filesFailed"; bucket: string; error: ConsoleError }
  | { type: "bucketCreated"; name: string; bucketNames: string[] | null }
  | { type: "createBucketFailed"; name: string; error: ConsoleError }
  | { type: "fileDeleted"; bucket: string; key: string }
  | { type: "deleteFailed"; bucket: string; key: string; error: ConsoleError }
  | { type: "uploadSucceeded"; bucket: string; key: string }
  | { type: "uploadFailed"; bucket: string; name: string; error: ConsoleError }
  | { type: "downloadSucceeded"; bucket: string; key: string; path: string }
  | { type: "downloadFailed"; bucket: string; key: string; error: ConsoleError }
  | { type: "sessionEnded" }
  | { type: "endSessionFailed"; error: ConsoleError };

export type SessionEvent = SessionCommand | SessionResult;

export type SessionEffect =
  | { type: "authenticate"; config: ConnectionConfig }
  | { type: "createBucket"; name: string }
  | { type: "listObjects"; bucket: string }
  | { type: "uploadObject"; bucket: string; source: UploadSource }
  | { type: "downloadObject"; bucket: string; key: string; destination: DownloadDestination }
  | { type: "deleteObject"; bucket: string; key: string }
  | { type: "endSession" };

export type SessionNotice = {
  level: "success" | "info" | "error";
  message: string;
  error?: ConsoleError;
};

export type TransitionResult = {
  state: SessionState;
  effects: SessionEffect[];
  notice?: SessionNotice;
};

const COMMAND_TYPES: ReadonlySet<string> = new Set<SessionCommand["type"]>([
  "connect",
  "disconnect",
  "selectBucket",
  "createBucket",
  "selectDeleteTarget",
  "setDeleteConfirmed",
  "deleteFile",
  "refreshFiles",
  "uploadFile",
  "downloadFile",
]);

export const isSessionCommand = (event: SessionEvent): event is SessionCommand => {
  return COMMAND_TYPES.has(event.type);
};

export const initialSessionState = (): SessionState => ({
  phase: "disconnected",
  config: null,
  bucketNames: [],
  currentBucket: null,
  currentFiles: [],
  filesStatus: "idle",
  pendingDeleteTarget: null,
  deleteConfirmed: false,
});

const stay = (state: SessionState, notice?: SessionNotice): TransitionResult => ({
  state,
  effects: [],
  notice,
});

const reject = (state: SessionState, message: string): TransitionResult =>
  stay(state, { level: "info", message });

const failure = (state: SessionState, message: string, error: ConsoleError): TransitionResult =>
  stay(state, { level: "error", message, error });

const PROVIDER_ERROR_MESSAGES = {
  AlreadyExists: "Bucket name is already taken. Please choose a different name.",
  InvalidName: "Invalid bucket name. Please follow the naming rules.",
} as const;

const describeCreateBucketError = (error: ConsoleError): string => {
  if (error.kind === "ProviderError" && error.code === "AlreadyExists") {
    return PROVIDER_ERROR_MESSAGES.AlreadyExists;
  }

  if (error.kind === "ProviderError" && error.code === "InvalidName") {
    return PROVIDER_ERROR_MESSAGES.InvalidName;
  }

  return `Error creating bucket: ${error.message}`;
};

const missingConnectionField = (config: ConnectionConfig): string | null => {
  if (!config.accessKeyId.trim() || !config.secretAccessKey.trim()) {
    return "Please provide both Access Key and Secret Key";
  }

  if (!config.endpoint.trim()) {
    return "Please provide Endpoint URL";
  }

  if (!config.region.trim()) {
    return "Please provide Region Name";
  }

  return null;
};

const withoutBucketSelection = (state: SessionState): SessionState => ({
  ...state,
  currentBucket: null,
  currentFiles: [],
  filesStatus: "idle",
  pendingDeleteTarget: null,
  deleteConfirmed: false,
});

const isCurrentBucket = (state: SessionState, bucket: string): boolean => {
  return state.phase === "connected" && state.currentBucket === bucket;
};

const applyCommand = (state: SessionState, command: SessionCommand): TransitionResult => {
  switch (command.type) {
    case "connect": {
      if (state.phase === "connecting") {
        return reject(state, "A connection attempt is already in progress");
      }

      const missing = missingConnectionField(command.config);

      if (missing) {
        return failure(state, missing, new ConsoleError(missing, "ValidationError"));
      }

      return {
        state: { ...initialSessionState(), phase: "connecting", config: command.config },
        effects: [{ type: "authenticate", config: command.config }],
      };
    }

    case "disconnect":
      return {
        state: initialSessionState(),
        effects: state.phase === "disconnected" ? [] : [{ type: "endSession" }],
      };

    case "selectBucket": {
      if (state.phase !== "connected") {
        return reject(state, "Connect to a storage service first");
      }

      if (!state.bucketNames.includes(command.bucket)) {
        return reject(state, `Bucket '${command.bucket}' is not in the bucket list`);
      }

      return {
        state: {
          ...withoutBucketSelection(state),
          currentBucket: command.bucket,
          filesStatus: "loading",
        },
        effects: [{ type: "listObjects", bucket: command.bucket }],
      };
    }

    case "createBucket": {
      if (state.phase !== "connected") {
        return reject(state, "Connect to a storage service first");
      }

      if (!command.name) {
        return failure(
          state,
          "Please enter a bucket name",
          new ConsoleError("Please enter a bucket name", "ValidationError"),
        );
      }

      const validation = validateBucketName(command.name);

      if (!validation.valid) {
        return failure(
          state,
          `Invalid bucket name: ${validation.message}`,
          new ConsoleError(validation.message, "ValidationError", validation.rule),
        );
      }

      return {
        state,
        effects: [{ type: "createBucket", name: command.name }],
      };
    }

    case "selectDeleteTarget": {
      if (state.phase !== "connected" || !state.currentBucket) {
        return reject(state, "Select a bucket first");
      }

      if (!state.currentFiles.includes(command.key)) {
        return reject(state, `File '${command.key}' is not in the current listing`);
      }

      if (state.pendingDeleteTarget === command.key) {
        return stay(state);
      }

      return stay({ ...state, pendingDeleteTarget: command.key, deleteConfirmed: false });
    }

    case "setDeleteConfirmed": {
      if (state.phase !== "connected" || !state.currentBucket) {
        return reject(state, "Select a bucket first");
      }

      if (state.deleteConfirmed === command.confirmed) {
        return stay(state);
      }

      return stay({ ...state, deleteConfirmed: command.confirmed });
    }

    case "deleteFile": {
      if (
        state.phase !== "connected" ||
        !state.currentBucket ||
        !state.pendingDeleteTarget ||
        !state.deleteConfirmed
      ) {
        return reject(state, "Confirm the deletion before deleting a file");
      }

      return {
        state,
        effects: [
          { type: "deleteObject", bucket: state.currentBucket, key: state.pendingDeleteTarget },
        ],
      };
    }

    case "refreshFiles": {
      if (state.phase !== "connected" || !state.currentBucket) {
        return reject(state, "Select a bucket first");
      }

      return {
        state: { ...state, filesStatus: "loading" },
        effects: [{ type: "listObjects", bucket: state.currentBucket }],
      };
    }

    case "uploadFile": {
      if (state.phase !== "connected" || !state.currentBucket) {
        return reject(state, "Select a bucket first");
      }

      return {
        state,
        effects: [{ type: "uploadObject", bucket: state.currentBucket, source: command.source }],
      };
    }

    case "downloadFile": {
      if (state.phase !== "connected" || !state.currentBucket) {
        return reject(state, "Select a bucket first");
      }

      return {
        state,
        effects: [
          {
            type: "downloadObject",
            bucket: state.currentBucket,
            key: command.key,
            destination: command.destination,
          },
        ],
      };
    }
  }
};

const applyResult = (state: SessionState, result: SessionResult): TransitionResult => {
  switch (result.type) {
    case "connectSucceeded": {
      if (state.phase !== "connecting" || !state.config) {
        return stay(state);
      }

      return stay(
        { ...state, phase: "connected", bucketNames: [...result.bucketNames] },
        { level: "success", message: "Connected successfully!" },
      );
    }

    case "connectFailed": {
      if (state.phase !== "connecting") {
        return stay(state);
      }

      return failure(
        initialSessionState(),
        `Connection failed: ${result.error.message}`,
        result.error,
      );
    }

    case "filesLoaded": {
      if (!isCurrentBucket(state, result.bucket)) {
        return stay(state);
      }

      const files = [...result.files];
      const targetStillListed =
        state.pendingDeleteTarget !== null && files.includes(state.pendingDeleteTarget);

      return stay({
        ...state,
        currentFiles: files,
        filesStatus: "loaded",
        pendingDeleteTarget: targetStillListed ? state.pendingDeleteTarget : null,
        deleteConfirmed: targetStillListed ? state.deleteConfirmed : false,
      });
    }

    case "filesFailed": {
      if (!isCurrentBucket(state, result.bucket)) {
        return stay(state);
      }

      return failure(
        {
          ...state,
          currentFiles: [],
          filesStatus: "failed",
          pendingDeleteTarget: null,
          deleteConfirmed: false,
        },
        `Error listing files: ${result.error.message}`,
        result.error,
      );
    }

    case "bucketCreated": {
      if (state.phase !== "connected") {
        return stay(state);
      }

      const listed = result.bucketNames ?? state.bucketNames;
      const bucketNames = listed.includes(result.name) ? [...listed] : [...listed, result.name];

      return stay(
        { ...state, bucketNames },
        { level: "success", message: `Bucket '${result.name}' created successfully!` },
      );
    }

    case "createBucketFailed":
      if (state.phase !== "connected") {
        return stay(state);
      }

      return failure(state, describeCreateBucketError(result.error), result.error);

    case "fileDeleted": {
      if (!isCurrentBucket(state, result.bucket)) {
        return stay(state);
      }

      // A target picked while the delete was in flight stays selected.
      const targetDeleted = state.pendingDeleteTarget === result.key;

      return stay(
        {
          ...state,
          currentFiles: state.currentFiles.filter((key) => key !== result.key),
          pendingDeleteTarget: targetDeleted ? null : state.pendingDeleteTarget,
          deleteConfirmed: targetDeleted ? false : state.deleteConfirmed,
        },
        { level: "success", message: `File '${result.key}' deleted successfully!` },
      );
    }

    case "deleteFailed":
      if (!isCurrentBucket(state, result.bucket)) {
        return stay(state);
      }

      return failure(state, `Error deleting file: ${result.error.message}`, result.error);

    case "uploadSucceeded": {
      if (!isCurrentBucket(state, result.bucket)) {
        return stay(state);
      }

      return {
        state: { ...state, filesStatus: "loading" },
        effects: [{ type: "listObjects", bucket: result.bucket }],
        notice: { level: "success", message: `File '${result.key}' uploaded successfully!` },
      };
    }

    case "uploadFailed":
      if (!isCurrentBucket(state, result.bucket)) {
        return stay(state);
      }

      return failure(state, `Error uploading file: ${result.error.message}`, result.error);

    case "downloadSucceeded":
      if (state.phase !== "connected") {
        return stay(state);
      }

      return stay(state, {
        level: "success",
        message: `File downloaded successfully to: ${result.path}`,
      });

    case "downloadFailed":
      if (state.phase !== "connected") {
        return stay(state);
      }

      return failure(state, `Error downloading file: ${result.error.message}`, result.error);

    case "sessionEnded":
      return stay(state);

    case "endSessionFailed":
      return stay(state, {
        level: "error",
        message: `Disconnected locally, but the server session could not be closed: ${result.error.message}`,
        error: result.error,
      });
  }
};

/**
 * Applies one event to the session. Pure: the input state is never mutated and
 * every external call is returned as an effect for the caller to perform.
 */
export const transition = (state: SessionState, event: SessionEvent): TransitionResult => {
  if (isSessionCommand(event)) {
    return applyCommand(state, event);
  }

  return applyResult(state, event);
};

export const isConnected = (state: SessionState): boolean => {
  return state.phase === "connected" && state.config !== null;
};
