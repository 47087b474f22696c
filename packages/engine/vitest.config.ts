import { createPackageVitestConfig } from "../vitest.workspace.config";

export default createPackageVitestConfig("engine");
