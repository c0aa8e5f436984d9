/**
 * Distribution Result Types
 *
 * Every distribution operation answers with a structured result instead of
 * throwing. Placement failures for individual students are not failures of
 * the run; they are listed in `unassigned`.
 */

import { Trimester } from "./section";
import { StudentSummary } from "./user";

/**
 * not_found    - the course/group id does not exist
 * precondition - data is not ready for distribution (no sections, no periods, ...)
 * unexpected   - the run threw and was rolled back
 */
export type DistributionErrorKind = "not_found" | "precondition" | "unexpected";

export interface DistributionFailure {
  success: false;
  error: string;
  errorKind: DistributionErrorKind;
}

export function failure(error: string, errorKind: DistributionErrorKind): DistributionFailure {
  return { success: false, error, errorKind };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export interface SectionDistribution {
  sectionId: string;
  sectionName: string;
  periodId: string | null;
  periodName: string | null;
  trimester: Trimester | null;
  studentCount: number;
  students: StudentSummary[];
}

export interface UnassignedStudent extends StudentSummary {
  reason: string;
}

export const UNASSIGNED_REASONS = {
  noAvailableSection: "Period conflicts or capacity constraints",
  finalCheckConflict: "Period conflict detected at final check",
  sectionFull: "Section capacity reached",
  studentNotFound: "Student not found",
} as const;

export interface CourseDistributionSuccess {
  success: true;
  courseId: string;
  courseName: string;
  courseCode?: string;
  totalStudents: number;
  numSections: number;
  distribution: SectionDistribution[];
  unassigned: UnassignedStudent[];
}

export type CourseDistributionResult = CourseDistributionSuccess | DistributionFailure;

export interface LanguageGroupDistributionSuccess {
  success: true;
  groupId: string;
  groupName: string;
  gradeLevel: number;
  totalStudents: number;
  distribution: SectionDistribution[];
  unassigned: UnassignedStudent[];
}

export type LanguageGroupDistributionResult = LanguageGroupDistributionSuccess | DistributionFailure;

export interface GradeLevelValidation {
  valid: boolean;
  totalStudents: number;
  errors: string[];
}

export interface PeriodConflict {
  studentId: string;
  periodId: string;
  sectionIds: string[];
}

export interface DistributionValidation {
  gradeLevels: Record<number, GradeLevelValidation>;
  conflicts: PeriodConflict[];
  requirementWarnings: string[];
}

export interface BatchDistributionSuccess {
  success: true;
  languageGroups: Record<string, LanguageGroupDistributionResult>;
  courses: Record<string, CourseDistributionResult>;
  validation: DistributionValidation;
}

export type BatchDistributionResult = BatchDistributionSuccess | DistributionFailure;

export interface ClearResult {
  success: boolean;
  error?: string;
  errorKind?: DistributionErrorKind;
  sectionsCleared: number;
}

export interface CourseDistributionStatus {
  success: true;
  courseId: string;
  courseName: string;
  courseCode?: string;
  totalStudents: number;
  numSections: number;
  isDistributed: boolean;
  distribution: SectionDistribution[];
}

export type DistributionStatusResult = CourseDistributionStatus | DistributionFailure;
