import { configure } from "@logtape/logtape";

// Tests assert on injected log deps; keep the LogTape sinks silent.
await configure({
  reset: true,
  sinks: {},
  loggers: [
    { category: ["tracklet"], lowestLevel: "fatal", sinks: [] },
    { category: ["logtape", "meta"], lowestLevel: "fatal", sinks: [] },
  ],
});
