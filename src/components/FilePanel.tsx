import { useRef, useState } from "react";
import { getDownloadUrl } from "../app/lib/api";
import type { SessionState } from "../app/lib/session-machine";
import type { DownloadDestination } from "../shared/types";

type FilePanelProps = {
  state: SessionState;
  disabled: boolean;
  onRefresh: () => void;
  onUpload: (file: File) => void;
  onSaveToServer: (key: string, destination: DownloadDestination) => void;
  onSelectDeleteTarget: (key: string) => void;
  onDeleteConfirmedChange: (confirmed: boolean) => void;
  onDelete: () => void;
};

const toDestination = (directory: string, filename: string): DownloadDestination => ({
  directory: directory.trim() || undefined,
  filename: filename.trim() || undefined,
});

export const FilePanel = ({
  state,
  disabled,
  onRefresh,
  onUpload,
  onSaveToServer,
  onSelectDeleteTarget,
  onDeleteConfirmedChange,
  onDelete,
}: FilePanelProps) => {
  const fileInputRef = useRef<HTMLInputElement | null>(null);
  const [directory, setDirectory] = useState("");
  const [filename, setFilename] = useState("");
  const { currentBucket, currentFiles, filesStatus, pendingDeleteTarget, deleteConfirmed } = state;

  if (!currentBucket) {
    return <div className="center-feedback">Select a bucket to see its files.</div>;
  }

  return (
    <div className="content-panel">
      <header className="toolbar">
        <h2>Files in {currentBucket}</h2>
        <div className="toolbar-actions">
          <input
            ref={fileInputRef}
            type="file"
            className="visually-hidden"
            disabled={disabled}
            onChange={(event) => {
              const file = event.target.files?.[0];

              if (file) {
                onUpload(file);
              }

              event.currentTarget.value = "";
            }}
          />
          <button type="button" disabled={disabled} onClick={() => fileInputRef.current?.click()}>
            Upload file
          </button>
          <button type="button" disabled={disabled} onClick={onRefresh}>
            Refresh
          </button>
        </div>
      </header>

      {filesStatus === "loading" ? (
        <div className="center-feedback status-banner" aria-live="polite">
          <span className="spinner" aria-hidden="true" />
          Loading files...
        </div>
      ) : null}

      {filesStatus === "failed" ? (
        <div className="center-feedback error-banner" role="alert">
          The file list could not be loaded.
        </div>
      ) : null}

      {filesStatus === "loaded" && !currentFiles.length ? (
        <div className="center-feedback">No files found in this bucket.</div>
      ) : null}

      {currentFiles.length ? (
        <table className="object-table">
          <thead>
            <tr>
              <th>Key</th>
              <th>Actions</th>
            </tr>
          </thead>
          <tbody>
            {currentFiles.map((key) => (
              <tr key={key} className={key === pendingDeleteTarget ? "selected" : undefined}>
                <td>{key}</td>
                <td className="row-actions">
                  <a href={getDownloadUrl(currentBucket, key)} download>
                    Download
                  </a>
                  <button
                    type="button"
                    disabled={disabled}
                    onClick={() => onSaveToServer(key, toDestination(directory, filename))}
                  >
                    Save to server
                  </button>
                  <button
                    type="button"
                    className="danger"
                    disabled={disabled}
                    onClick={() => onSelectDeleteTarget(key)}
                  >
                    Select for delete
                  </button>
                </td>
              </tr>
            ))}
          </tbody>
        </table>
      ) : null}

      <section className="save-options">
        <h3>Server download location</h3>
        <label>
          Folder (inside the download directory)
          <input type="text" value={directory} onChange={(event) => setDirectory(event.target.value)} />
        </label>
        <label>
          File name (defaults to the object name)
          <input type="text" value={filename} onChange={(event) => setFilename(event.target.value)} />
        </label>
      </section>

      {pendingDeleteTarget ? (
        <section className="delete-confirm" role="group" aria-label="Delete file">
          <p>
            Delete <strong>{pendingDeleteTarget}</strong>? This cannot be undone.
          </p>
          <label>
            <input
              type="checkbox"
              checked={deleteConfirmed}
              onChange={(event) => onDeleteConfirmedChange(event.target.checked)}
            />
            I confirm I want to delete this file
          </label>
          <button
            type="button"
            className="danger"
            disabled={disabled || !deleteConfirmed}
            onClick={onDelete}
          >
            Delete file
          </button>
        </section>
      ) : null}
    </div>
  );
};
