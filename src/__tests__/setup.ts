import { vi } from "vitest";

// Mock the Firecrawl SDK globally so no test reaches the network.
// Every client shares the same mocked methods, so tests can inspect the calls.
// Tests that exercise search inject their own SearchAdapter.
vi.mock("@mendable/firecrawl-js", () => {
  const search = vi.fn(async () => ({ web: [] }));
  const scrape = vi.fn(async () => ({ markdown: "", metadata: {} }));
  return {
    default: class {
      search = search;
      scrape = scrape;
    },
  };
});
