import config from "@src/config";

// Always enable debug logging during tests.
config.debugLogging = true;

// However, the logger needs to know it is running in a test environment
// so it can stay quiet.
config.inTestEnv = true;
