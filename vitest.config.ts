import { defineConfig, defineProject } from "vitest/config";
import { aliases } from "./vitest.aliases";

const defaultExclude = ["**/node_modules/**", "**/dist/**", "**/coverage/**"];

function packageProject(name: string) {
  return defineProject({
    resolve: {
      alias: aliases,
    },
    test: {
      name,
      include: [`packages/${name}/src/**/__tests__/**/*.test.ts`],
      exclude: defaultExclude,
      environment: "node",
      server: {
        deps: {
          inline: [/@inktrail\/.*/],
        },
      },
    },
  });
}

export default defineConfig({
  resolve: {
    alias: aliases,
  },
  test: {
    environment: "node",
    exclude: defaultExclude,
    projects: [packageProject("telemetry"), packageProject("history"), packageProject("cli")],
  },
});
