export const PROVIDER_LABELS = ["AWS", "ArvanCloud", "Custom"] as const;

export type ProviderLabel = (typeof PROVIDER_LABELS)[number];

export type ProviderPreset = {
  label: ProviderLabel;
  defaultEndpoint: string;
  defaultRegion: string;
  // Region in which CreateBucket must be sent without a location constraint.
  unconstrainedRegion?: string;
};

export type EndpointExample = {
  name: string;
  endpoint: string;
  region: string;
};

export const PROVIDER_PRESETS: Record<ProviderLabel, ProviderPreset> = {
  AWS: {
    label: "AWS",
    defaultEndpoint: "https://s3.amazonaws.com",
    defaultRegion: "us-east-1",
    unconstrainedRegion: "us-east-1",
  },
  ArvanCloud: {
    label: "ArvanCloud",
    defaultEndpoint: "https://s3.ir-thr-at1.arvanstorage.ir",
    defaultRegion: "ir-thr-at1",
  },
  Custom: {
    label: "Custom",
    defaultEndpoint: "",
    defaultRegion: "",
  },
};

export const ENDPOINT_EXAMPLES: EndpointExample[] = [
  { name: "AWS", endpoint: "https://s3.amazonaws.com", region: "us-east-1" },
  { name: "AWS other regions", endpoint: "https://s3.eu-west-1.amazonaws.com", region: "eu-west-1" },
  { name: "ArvanCloud", endpoint: "https://s3.ir-thr-at1.arvanstorage.ir", region: "ir-thr-at1" },
  { name: "DigitalOcean Spaces", endpoint: "https://nyc3.digitaloceanspaces.com", region: "nyc3" },
  { name: "Linode Object Storage", endpoint: "https://us-east-1.linodeobjects.com", region: "us-east-1" },
  { name: "Wasabi", endpoint: "https://s3.wasabisys.com", region: "us-east-1" },
];

export const isProviderLabel = (value: string): value is ProviderLabel => {
  return PROVIDER_LABELS.some((label) => label === value);
};

export const needsLocationConstraint = (provider: ProviderLabel, region: string): boolean => {
  return PROVIDER_PRESETS[provider].unconstrainedRegion !== region;
};
