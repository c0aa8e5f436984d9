import fs from "fs";
import path from "path";
import { Course } from "../domain/course";
import { Section } from "../domain/section";
import { Period } from "../domain/period";
import { Room } from "../domain/room";
import { User } from "../domain/user";
import { CourseGroup, LanguageGroup } from "../domain/groups";

export const DEFAULT_DATA_FILE = path.join(__dirname, "../../data/school.json");

/**
 * SchoolDatabase holds every scheduling entity in a single JSON document.
 *
 * Entity stores read and mutate `tables` directly and call `save()` after
 * each change. Inside `transaction()` saves are deferred: the document is
 * written once when the outermost transaction commits, and a throw restores
 * the snapshot taken on entry. Transactions nest; an inner failure only
 * rolls back the inner unit.
 *
 * Pass `null` as the data file for an in-memory database (used by tests).
 */

export interface SchoolData {
  courses: Course[];
  sections: Section[];
  periods: Period[];
  rooms: Room[];
  users: User[];
  languageGroups: LanguageGroup[];
  courseGroups: CourseGroup[];
  lastUpdated: string;
}

function emptyData(): SchoolData {
  return {
    courses: [],
    sections: [],
    periods: [],
    rooms: [],
    users: [],
    languageGroups: [],
    courseGroups: [],
    lastUpdated: new Date().toISOString(),
  };
}

export class SchoolDatabase {
  private data: SchoolData;
  private snapshots: SchoolData[] = [];

  constructor(private readonly dataFile: string | null = DEFAULT_DATA_FILE) {
    if (dataFile) {
      const dataDir = path.dirname(dataFile);
      if (!fs.existsSync(dataDir)) {
        fs.mkdirSync(dataDir, { recursive: true });
      }
    }
    this.data = this.loadData();
  }

  /**
   * Live tables. Do not hold on to the arrays across a transaction boundary:
   * a rollback swaps them out.
   */
  get tables(): SchoolData {
    return this.data;
  }

  get inTransaction(): boolean {
    return this.snapshots.length > 0;
  }

  save(): void {
    if (this.inTransaction) {
      return;
    }
    this.writeData();
  }

  transaction<T>(work: () => T): T {
    this.snapshots.push(structuredClone(this.data));

    let result: T;
    try {
      result = work();
    } catch (err) {
      const snapshot = this.snapshots.pop();
      if (snapshot) {
        this.data = snapshot;
      }
      throw err;
    }

    this.snapshots.pop();
    this.save();
    return result;
  }

  // ============================================
  // File I/O
  // ============================================

  private loadData(): SchoolData {
    if (!this.dataFile || !fs.existsSync(this.dataFile)) {
      return emptyData();
    }

    try {
      const content = fs.readFileSync(this.dataFile, "utf-8");
      const parsed: Partial<SchoolData> = JSON.parse(content);
      return { ...emptyData(), ...parsed };
    } catch (err) {
      console.error("Error loading school data:", err);
      return emptyData();
    }
  }

  private writeData(): void {
    this.data.lastUpdated = new Date().toISOString();
    if (!this.dataFile) {
      return;
    }
    fs.writeFileSync(this.dataFile, JSON.stringify(this.data, null, 2));
  }
}

let sharedDatabase: SchoolDatabase | null = null;

/**
 * Process-wide database backed by the configured data file
 */
export function getSchoolDatabase(dataFile?: string): SchoolDatabase {
  if (!sharedDatabase) {
    sharedDatabase = new SchoolDatabase(dataFile ?? DEFAULT_DATA_FILE);
  }
  return sharedDatabase;
}

/**
 * Copy of an update payload without keys whose value is undefined, so that
 * spreading it over a record never blanks out an existing field
 */
export function definedFields<T extends object>(input: T): Partial<T> {
  const result: Partial<T> = { ...input };
  for (const key in result) {
    if (result[key] === undefined) {
      delete result[key];
    }
  }
  return result;
}
