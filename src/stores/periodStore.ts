/**
 * Period Store
 *
 * Periods are kept in start-time order. Deleting a period never deletes a
 * section: sections scheduled in it simply lose their period.
 */

import { randomUUID } from "crypto";
import {
  CreatePeriodInput,
  Period,
  UpdatePeriodInput,
  comparePeriods,
  validatePeriod,
} from "../domain/period";
import { SchoolDatabase, definedFields, getSchoolDatabase } from "./schoolDatabase";
import { SectionStore } from "./sectionStore";
import { ValidationError } from "../domain/validationError";

export class PeriodStore {
  private sectionStore: SectionStore;

  constructor(private readonly db: SchoolDatabase = getSchoolDatabase()) {
    this.sectionStore = new SectionStore(db);
  }

  create(input: CreatePeriodInput): Period {
    const errors = this.validate(input);
    if (errors.length > 0) {
      throw new ValidationError("period", errors);
    }

    const period: Period = {
      id: randomUUID(),
      name: input.name.trim(),
      startTime: input.startTime.trim(),
      endTime: input.endTime.trim(),
      createdAt: new Date().toISOString(),
    };

    this.db.tables.periods.push(period);
    this.db.save();
    return period;
  }

  /**
   * Validate times, minimum length, name uniqueness and overlap with other periods
   */
  validate(input: { name?: string; startTime: string; endTime: string }, periodId?: string): string[] {
    const others = this.db.tables.periods.filter((p) => p.id !== periodId);
    const errors = validatePeriod(input, others);

    const name = input.name?.trim();
    if (name && others.some((p) => p.name === name)) {
      errors.push(`A period named ${name} already exists`);
    }
    return errors;
  }

  load(periodId: string): Period | null {
    return this.db.tables.periods.find((p) => p.id === periodId) || null;
  }

  getAll(): Period[] {
    return [...this.db.tables.periods].sort(comparePeriods);
  }

  update(periodId: string, input: UpdatePeriodInput): Period | null {
    const existing = this.load(periodId);
    if (!existing) {
      return null;
    }

    const merged = { ...existing, ...definedFields(input) };
    const errors = this.validate(merged, periodId);
    if (errors.length > 0) {
      throw new ValidationError("period", errors);
    }

    Object.assign(existing, {
      name: merged.name.trim(),
      startTime: merged.startTime.trim(),
      endTime: merged.endTime.trim(),
      updatedAt: new Date().toISOString(),
    });
    this.db.save();
    return existing;
  }

  /**
   * Delete a period, detaching it from sections and language groups
   */
  delete(periodId: string): boolean {
    const tables = this.db.tables;
    const initialLength = tables.periods.length;
    tables.periods = tables.periods.filter((p) => p.id !== periodId);
    if (tables.periods.length === initialLength) {
      return false;
    }

    this.sectionStore.detachReference("periodId", periodId);
    for (const group of tables.languageGroups) {
      group.periodIds = group.periodIds.filter((id) => id !== periodId);
    }

    this.db.save();
    return true;
  }
}
