import { useCallback, useState, useSyncExternalStore } from "react";
import { SessionController, type SessionSnapshot, type StorageGateway } from "./session-controller";
import type { SessionCommand } from "./session-machine";

export type UseSessionResult = SessionSnapshot & {
  dispatch: (command: SessionCommand) => Promise<void>;
  dismissNotice: () => void;
};

export const useSession = (createGateway: () => StorageGateway): UseSessionResult => {
  const [controller] = useState(() => new SessionController(createGateway()));
  const snapshot = useSyncExternalStore(controller.subscribe, controller.getSnapshot);

  const dispatch = useCallback(
    (command: SessionCommand) => controller.dispatch(command),
    [controller],
  );
  const dismissNotice = useCallback(() => controller.dismissNotice(), [controller]);

  return { ...snapshot, dispatch, dismissNotice };
};
