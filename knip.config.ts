import type { KnipConfig } from "knip";

const config: KnipConfig = {
  workspaces: {
    // Pure layout engine
    "packages/layout": {
      entry: ["src/index.ts"],
      project: ["src/**/*.ts"],
    },
    // Calendar state consumed by renderers
    "packages/state": {
      entry: ["src/index.ts"],
      project: ["src/**/*.ts"],
    },
  },

  ignore: ["**/node_modules/**", "**/dist/**", "**/coverage/**"],
};

export default config;
