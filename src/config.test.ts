import path from "path";
import { loadConfig } from "./config";
import { DEFAULT_COURSE_TYPE_PRIORITY } from "./domain/course";
import { DEFAULT_DATA_FILE } from "./stores/schoolDatabase";

describe("loadConfig", () => {
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      port: 3001,
      corsOrigins: ["http://localhost:5173", "http://localhost:3000"],
      dataFile: DEFAULT_DATA_FILE,
      distributionSeed: null,
      courseTypePriority: DEFAULT_COURSE_TYPE_PRIORITY,
    });
  });

  it("reads every setting from the environment", () => {
    const config = loadConfig({
      API_PORT: "4000",
      CORS_ORIGINS: "https://school.test, http://localhost:8080",
      SCHOOL_DATA_FILE: "tmp/school.json",
      DISTRIBUTION_SEED: "42",
      COURSE_TYPE_PRIORITY: "elective,core",
    });

    expect(config).toEqual({
      port: 4000,
      corsOrigins: ["https://school.test", "http://localhost:8080"],
      dataFile: path.resolve("tmp/school.json"),
      distributionSeed: 42,
      courseTypePriority: ["ELECTIVE", "CORE", "REQUIRED_ELECTIVE", "LANGUAGE"],
    });
  });

  it("ignores invalid values with a warning", () => {
    const config = loadConfig({
      API_PORT: "not-a-port",
      DISTRIBUTION_SEED: "1.5",
      COURSE_TYPE_PRIORITY: "LANGUAGE,OPTIONAL",
    });

    expect(config.port).toBe(3001);
    expect(config.distributionSeed).toBeNull();
    expect(config.courseTypePriority).toEqual(["LANGUAGE", "CORE", "REQUIRED_ELECTIVE", "ELECTIVE"]);
    expect(warnSpy).toHaveBeenCalledTimes(3);
  });
});
