import { createPackageVitestConfig } from "../../packages/vitest.workspace.config";

export default createPackageVitestConfig("cli");
