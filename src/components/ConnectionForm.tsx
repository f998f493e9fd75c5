import { useState } from "react";
import {
  PROVIDER_LABELS,
  PROVIDER_PRESETS,
  isProviderLabel,
  type EndpointExample,
  type ProviderLabel,
} from "../shared/providers";
import type { ConnectionConfig } from "../shared/types";

type ConnectionFormProps = {
  isConnecting: boolean;
  examples: EndpointExample[];
  onSubmit: (config: ConnectionConfig) => Promise<void>;
};

export const ConnectionForm = ({ isConnecting, examples, onSubmit }: ConnectionFormProps) => {
  const [provider, setProvider] = useState<ProviderLabel>("AWS");
  const [endpoint, setEndpoint] = useState(PROVIDER_PRESETS.AWS.defaultEndpoint);
  const [region, setRegion] = useState(PROVIDER_PRESETS.AWS.defaultRegion);
  const [accessKeyId, setAccessKeyId] = useState("");
  const [secretAccessKey, setSecretAccessKey] = useState("");

  const selectProvider = (value: string) => {
    if (!isProviderLabel(value)) {
      return;
    }

    setProvider(value);
    setEndpoint(PROVIDER_PRESETS[value].defaultEndpoint);
    setRegion(PROVIDER_PRESETS[value].defaultRegion);
  };

  const handleSubmit = async (event: React.FormEvent) => {
    event.preventDefault();
    await onSubmit({
      provider,
      endpoint: endpoint.trim(),
      region: region.trim(),
      accessKeyId: accessKeyId.trim(),
      secretAccessKey: secretAccessKey.trim(),
    });
  };

  return (
    <div className="login-shell">
      <form className="login-card" onSubmit={handleSubmit}>
        <h1>Skiff</h1>
        <p>Connect to an S3-compatible storage service.</p>

        <label>
          Storage provider
          <select value={provider} onChange={(event) => selectProvider(event.target.value)}>
            {PROVIDER_LABELS.map((label) => (
              <option key={label} value={label}>
                {label}
              </option>
            ))}
          </select>
        </label>

        <label>
          Endpoint URL
          <input
            type="url"
            value={endpoint}
            placeholder="https://s3.example.com"
            onChange={(event) => setEndpoint(event.target.value)}
          />
        </label>

        <label>
          Region
          <input type="text" value={region} onChange={(event) => setRegion(event.target.value)} />
        </label>

        <label>
          Access Key
          <input
            type="text"
            value={accessKeyId}
            onChange={(event) => setAccessKeyId(event.target.value)}
            autoComplete="username"
          />
        </label>

        <label>
          Secret Key
          <input
            type="password"
            value={secretAccessKey}
            onChange={(event) => setSecretAccessKey(event.target.value)}
            autoComplete="current-password"
          />
        </label>

        <button type="submit" disabled={isConnecting}>
          {isConnecting ? "Connecting..." : "Connect"}
        </button>

        {provider === "Custom" && examples.length ? (
          <details className="endpoint-examples">
            <summary>Common endpoint examples</summary>
            <ul>
              {examples.map((example) => (
                <li key={example.name}>
                  <button
                    type="button"
                    className="link-button"
                    onClick={() => {
                      setEndpoint(example.endpoint);
                      setRegion(example.region);
                    }}
                  >
                    {example.name}
                  </button>
                  <code>{example.endpoint}</code> <span>({example.region})</span>
                </li>
              ))}
            </ul>
          </details>
        ) : null}
      </form>
    </div>
  );
};
