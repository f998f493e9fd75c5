import { useEffect } from "react";
import { useMutation, useQuery } from "@tanstack/react-query";
import { createHttpStorageGateway, getProviders, getSessionInfo, logout } from "./lib/api";
import { useSession } from "./lib/use-session";
import { BucketPanel } from "../components/BucketPanel";
import { ConnectionForm } from "../components/ConnectionForm";
import { FilePanel } from "../components/FilePanel";
import type { SessionNotice } from "./lib/session-machine";

const NoticeBanner = ({ notice, onDismiss }: { notice: SessionNotice; onDismiss: () => void }) => {
  const className = notice.level === "error" ? "error-banner" : `${notice.level}-banner`;

  return (
    <div className={`notice ${className}`} role={notice.level === "error" ? "alert" : "status"}>
      <span>{notice.message}</span>
      <button type="button" className="link-button" onClick={onDismiss} aria-label="Dismiss">
        ×
      </button>
    </div>
  );
};

export const App = () => {
  const { state, busy, notice, dispatch, dismissNotice } = useSession(createHttpStorageGateway);

  const providersQuery = useQuery({
    queryKey: ["providers"],
    queryFn: getProviders,
    staleTime: Infinity,
  });

  // The console always starts disconnected, so a session cookie left by a
  // previous page load is closed on the server.
  const leftoverSessionQuery = useQuery({
    queryKey: ["leftover-session"],
    queryFn: getSessionInfo,
    retry: false,
    staleTime: Infinity,
  });
  const { mutate: endLeftoverSession, isPending: isEndingLeftoverSession } = useMutation({
    mutationFn: logout,
  });

  useEffect(() => {
    if (leftoverSessionQuery.data) {
      endLeftoverSession();
    }
  }, [leftoverSessionQuery.data, endLeftoverSession]);

  if (leftoverSessionQuery.isLoading || isEndingLeftoverSession) {
    return (
      <div className="centered">
        <div className="center-feedback">
          <span className="spinner" aria-hidden="true" />
          Preparing console...
        </div>
      </div>
    );
  }

  const banner = notice ? <NoticeBanner notice={notice} onDismiss={dismissNotice} /> : null;

  if (state.phase !== "connected") {
    return (
      <>
        {banner}
        <ConnectionForm
          isConnecting={state.phase === "connecting"}
          examples={providersQuery.data?.examples ?? []}
          onSubmit={(config) => dispatch({ type: "connect", config })}
        />
      </>
    );
  }

  return (
    <div className="layout">
      <aside className="sidebar">
        <div className="sidebar-header">
          <h2>Buckets</h2>
          {state.config ? (
            <p className="muted">
              {state.config.provider} · {state.config.region}
            </p>
          ) : null}
        </div>
        <BucketPanel
          bucketNames={state.bucketNames}
          currentBucket={state.currentBucket}
          disabled={busy}
          onSelect={(bucket) => void dispatch({ type: "selectBucket", bucket })}
          onCreate={(name) => dispatch({ type: "createBucket", name })}
        />
        <button
          type="button"
          className="logout"
          onClick={() => void dispatch({ type: "disconnect" })}
        >
          Disconnect
        </button>
      </aside>

      <main className="main-panel">
        {banner}
        <FilePanel
          state={state}
          disabled={busy}
          onRefresh={() => void dispatch({ type: "refreshFiles" })}
          onUpload={(file) =>
            void dispatch({ type: "uploadFile", source: { name: file.name, body: file } })
          }
          onSaveToServer={(key, destination) =>
            void dispatch({ type: "downloadFile", key, destination })
          }
          onSelectDeleteTarget={(key) => void dispatch({ type: "selectDeleteTarget", key })}
          onDeleteConfirmedChange={(confirmed) =>
            void dispatch({ type: "setDeleteConfirmed", confirmed })
          }
          onDelete={() => void dispatch({ type: "deleteFile" })}
        />
      </main>
    </div>
  );
};
