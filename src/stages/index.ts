export { runScenarioTest, scenarioEnv } from './scenario-test';
export { runStaticCheck } from './static-check';
export { entryFilePath, runSyntaxCheck } from './syntax-check';
