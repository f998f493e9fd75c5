import React from "react";
import * as Sentry from "@sentry/react";
import { createRoot } from "react-dom/client";
import { QueryClient, QueryClientProvider } from "@tanstack/react-query";
import { App } from "./App";
import { initializeSentry } from "./sentry.client";
import "@fontsource-variable/work-sans";
import "./styles.css";

const queryClient = new QueryClient({
  defaultOptions: {
    queries: {
      refetchOnWindowFocus: false,
    },
  },
});

const bootstrap = async () => {
  await initializeSentry();

  const container = document.getElementById("root");

  if (!container) {
    throw new Error("Root element #root is missing from index.html");
  }

  createRoot(container).render(
    <React.StrictMode>
      <Sentry.ErrorBoundary fallback={<div className="centered">An unexpected error occurred.</div>}>
        <QueryClientProvider client={queryClient}>
          <App />
        </QueryClientProvider>
      </Sentry.ErrorBoundary>
    </React.StrictMode>,
  );
};

bootstrap().catch((error: unknown) => {
  console.error("Failed to start the console", error);
});
