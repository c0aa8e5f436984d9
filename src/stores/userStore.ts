/**
 * User Store
 *
 * Students, teachers and admins. Students are the only users the distributor
 * places; teachers are referenced by sections.
 */

import { randomUUID } from "crypto";
import {
  CreateUserInput,
  Student,
  UpdateUserInput,
  User,
  UserRole,
  isStudent,
  validateUser,
} from "../domain/user";
import { SchoolDatabase, definedFields, getSchoolDatabase } from "./schoolDatabase";
import { SectionStore } from "./sectionStore";
import { ValidationError } from "../domain/validationError";

function compareUsers(a: User, b: User): number {
  return a.lastName.localeCompare(b.lastName) || a.firstName.localeCompare(b.firstName);
}

export class UserStore {
  private sectionStore: SectionStore;

  constructor(private readonly db: SchoolDatabase = getSchoolDatabase()) {
    this.sectionStore = new SectionStore(db);
  }

  create(input: CreateUserInput): User {
    const role = input.role ?? "STUDENT";
    const errors = validateUser({ ...input, role });
    if (errors.length > 0) {
      throw new ValidationError("user", errors);
    }

    const user: User = {
      id: randomUUID(),
      firstName: input.firstName.trim(),
      lastName: input.lastName.trim(),
      role,
      email: input.email,
      gradeLevel: input.gradeLevel,
      createdAt: new Date().toISOString(),
    };

    this.db.tables.users.push(user);
    this.db.save();
    return user;
  }

  load(userId: string): User | null {
    return this.db.tables.users.find((u) => u.id === userId) || null;
  }

  loadStudent(studentId: string): Student | null {
    const user = this.load(studentId);
    return user && isStudent(user) ? user : null;
  }

  getAll(role?: UserRole): User[] {
    return this.db.tables.users.filter((u) => !role || u.role === role).sort(compareUsers);
  }

  /**
   * Students, optionally limited to one grade level
   */
  getStudents(gradeLevel?: number): Student[] {
    return this.db.tables.users
      .filter(isStudent)
      .filter((s) => gradeLevel === undefined || s.gradeLevel === gradeLevel)
      .sort(compareUsers);
  }

  getTeachers(): User[] {
    return this.getAll("TEACHER");
  }

  /**
   * Teachers with no section in the given period
   */
  getAvailableTeachers(periodId: string): User[] {
    const busy = new Set(this.sectionStore.getByPeriod(periodId).map((s) => s.teacherId));
    return this.getTeachers().filter((t) => !busy.has(t.id));
  }

  update(userId: string, input: UpdateUserInput): User | null {
    const existing = this.load(userId);
    if (!existing) {
      return null;
    }

    const changes = definedFields(input);
    const errors = validateUser(changes);
    if (errors.length > 0) {
      throw new ValidationError("user", errors);
    }

    Object.assign(existing, changes, { updatedAt: new Date().toISOString() });
    this.db.save();
    return existing;
  }

  /**
   * Delete a user. Students leave every roster and section; teachers are
   * detached from their sections.
   */
  delete(userId: string): boolean {
    const tables = this.db.tables;
    const existing = this.load(userId);
    if (!existing) {
      return false;
    }

    tables.users = tables.users.filter((u) => u.id !== userId);
    for (const course of tables.courses) {
      course.registeredStudentIds = course.registeredStudentIds.filter((id) => id !== userId);
    }
    for (const section of tables.sections) {
      section.studentIds = section.studentIds.filter((id) => id !== userId);
    }
    if (existing.role === "TEACHER") {
      this.sectionStore.detachReference("teacherId", userId);
    }

    this.db.save();
    return true;
  }
}
