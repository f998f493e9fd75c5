import { useState } from "react";
import { BUCKET_NAMING_RULES } from "../shared/bucket-name";

type BucketPanelProps = {
  bucketNames: string[];
  currentBucket: string | null;
  disabled: boolean;
  onSelect: (bucket: string) => void;
  onCreate: (name: string) => Promise<void>;
};

export const BucketPanel = ({
  bucketNames,
  currentBucket,
  disabled,
  onSelect,
  onCreate,
}: BucketPanelProps) => {
  const [name, setName] = useState("");

  const handleCreate = async (event: React.FormEvent) => {
    event.preventDefault();
    await onCreate(name.trim());
    setName("");
  };

  return (
    <>
      <div className="bucket-list">
        {bucketNames.length ? null : <p className="muted">No buckets found.</p>}
        {bucketNames.map((bucket) => (
          <button
            key={bucket}
            type="button"
            className={bucket === currentBucket ? "bucket active" : "bucket"}
            onClick={() => onSelect(bucket)}
            disabled={disabled}
          >
            {bucket}
          </button>
        ))}
      </div>

      <form className="create-bucket" onSubmit={handleCreate}>
        <label>
          New bucket name
          <input
            type="text"
            value={name}
            placeholder="my-bucket"
            onChange={(event) => setName(event.target.value)}
            disabled={disabled}
          />
        </label>
        <button type="submit" disabled={disabled}>
          Create bucket
        </button>
        <ul className="naming-rules">
          {BUCKET_NAMING_RULES.map((rule) => (
            <li key={rule}>{rule}</li>
          ))}
        </ul>
      </form>
    </>
  );
};
