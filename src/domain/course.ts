/**
 * Course Domain Model
 *
 * A course is an academic offering for one grade level. It is distinct from
 * its sections: students first register for the course, then the distributor
 * places each registered student into one of the course's sections.
 *
 * Relationships:
 * - Course has Sections (via Section.courseId)
 * - Course has registered Students (via registeredStudentIds)
 * - Course may belong to one LanguageGroup and any number of CourseGroups
 */

export type CourseType = "CORE" | "REQUIRED_ELECTIVE" | "ELECTIVE" | "LANGUAGE";

export type CourseDuration = "QUARTER" | "TRIMESTER" | "YEAR";

export type StudentCountRequirementType = "FULL_GRADE" | "EXACT" | "MIN" | "MAX";

export const COURSE_TYPES: CourseType[] = ["CORE", "REQUIRED_ELECTIVE", "ELECTIVE", "LANGUAGE"];

export const COURSE_DURATIONS: CourseDuration[] = ["QUARTER", "TRIMESTER", "YEAR"];

export const STUDENT_COUNT_REQUIREMENT_TYPES: StudentCountRequirementType[] = [
  "FULL_GRADE",
  "EXACT",
  "MIN",
  "MAX",
];

export const MIN_GRADE_LEVEL = 6;
export const MAX_GRADE_LEVEL = 12;

/**
 * Default order in which the batch run distributes course types.
 * Earlier entries are distributed first.
 */
export const DEFAULT_COURSE_TYPE_PRIORITY: CourseType[] = [
  "CORE",
  "REQUIRED_ELECTIVE",
  "ELECTIVE",
  "LANGUAGE",
];

export interface StudentCountRequirement {
  type: StudentCountRequirementType;
  count?: number; // Not used by FULL_GRADE
}

export interface Course {
  id: string;
  name: string;
  code?: string; // Short alphanumeric code, e.g. "ENG7"
  description?: string;
  gradeLevel: number;
  courseType: CourseType;
  duration: CourseDuration;
  numSections: number;
  maxStudentsPerSection: number;
  exclusivityGroup?: string; // Courses sharing a label are mutually exclusive
  studentCountRequirement?: StudentCountRequirement;

  // Students signed up for the course, before section assignment
  registeredStudentIds: string[];

  createdAt: string;
  updatedAt?: string;
}

export interface CreateCourseInput {
  name: string;
  code?: string;
  description?: string;
  gradeLevel: number;
  courseType?: CourseType;
  duration?: CourseDuration;
  numSections?: number;
  maxStudentsPerSection?: number;
  exclusivityGroup?: string;
  studentCountRequirement?: StudentCountRequirement;
  registeredStudentIds?: string[];
}

export interface UpdateCourseInput {
  name?: string;
  code?: string;
  description?: string;
  gradeLevel?: number;
  courseType?: CourseType;
  duration?: CourseDuration;
  numSections?: number;
  maxStudentsPerSection?: number;
  exclusivityGroup?: string;
  studentCountRequirement?: StudentCountRequirement;
}

export function isCourseType(value: unknown): value is CourseType {
  return typeof value === "string" && (COURSE_TYPES as string[]).includes(value);
}

export function isCourseDuration(value: unknown): value is CourseDuration {
  return typeof value === "string" && (COURSE_DURATIONS as string[]).includes(value);
}

export function isStudentCountRequirementType(value: unknown): value is StudentCountRequirementType {
  return (
    typeof value === "string" &&
    (STUDENT_COUNT_REQUIREMENT_TYPES as string[]).includes(value)
  );
}

/**
 * Display label, e.g. "English 7 (ENG7)" or "English 7 (Grade 7)"
 */
export function getCourseLabel(course: Pick<Course, "name" | "code" | "gradeLevel">): string {
  if (course.code) {
    return `${course.name} (${course.code})`;
  }
  return `${course.name} (Grade ${course.gradeLevel})`;
}

export function getTotalCapacity(course: Course): number {
  return course.numSections * course.maxStudentsPerSection;
}

/**
 * Rank of a course type in the given priority order (lower runs first).
 * Types missing from the list rank after every listed type.
 */
export function getCourseTypeRank(
  courseType: CourseType,
  priority: CourseType[] = DEFAULT_COURSE_TYPE_PRIORITY
): number {
  const index = priority.indexOf(courseType);
  return index === -1 ? priority.length : index;
}

/**
 * Validate course fields. Returns a list of problems (empty when valid).
 */
export function validateCourse(input: {
  name?: string;
  code?: string;
  gradeLevel?: number;
  courseType?: unknown;
  duration?: unknown;
  numSections?: number;
  maxStudentsPerSection?: number;
  studentCountRequirement?: StudentCountRequirement;
}): string[] {
  const errors: string[] = [];

  if (input.name !== undefined && input.name.trim().length === 0) {
    errors.push("name is required");
  }

  if (input.code !== undefined && input.code !== "" && !/^[A-Za-z0-9]+$/.test(input.code)) {
    errors.push("code must contain only letters and numbers");
  }

  if (input.gradeLevel !== undefined) {
    if (
      !Number.isInteger(input.gradeLevel) ||
      input.gradeLevel < MIN_GRADE_LEVEL ||
      input.gradeLevel > MAX_GRADE_LEVEL
    ) {
      errors.push(`gradeLevel must be between ${MIN_GRADE_LEVEL} and ${MAX_GRADE_LEVEL}`);
    }
  }

  if (input.courseType !== undefined && !isCourseType(input.courseType)) {
    errors.push(`courseType must be one of ${COURSE_TYPES.join(", ")}`);
  }

  if (input.duration !== undefined && !isCourseDuration(input.duration)) {
    errors.push(`duration must be one of ${COURSE_DURATIONS.join(", ")}`);
  }

  if (input.numSections !== undefined) {
    if (!Number.isInteger(input.numSections) || input.numSections < 1) {
      errors.push("numSections must be at least 1");
    }
  }

  if (input.maxStudentsPerSection !== undefined) {
    if (!Number.isInteger(input.maxStudentsPerSection) || input.maxStudentsPerSection < 1) {
      errors.push("maxStudentsPerSection must be at least 1");
    }
  }

  const requirement = input.studentCountRequirement;
  if (requirement !== undefined) {
    if (!isStudentCountRequirementType(requirement.type)) {
      errors.push(
        `studentCountRequirement.type must be one of ${STUDENT_COUNT_REQUIREMENT_TYPES.join(", ")}`
      );
    } else if (requirement.type !== "FULL_GRADE") {
      if (
        requirement.count === undefined ||
        !Number.isInteger(requirement.count) ||
        requirement.count < 0
      ) {
        errors.push(`studentCountRequirement.count is required for ${requirement.type}`);
      }
    }
  }

  return errors;
}

/**
 * Check a registered-student count against a course's count requirement.
 * Returns a message describing the mismatch, or null when satisfied.
 */
export function checkStudentCountRequirement(
  course: Course,
  gradePopulation: number
): string | null {
  const requirement = course.studentCountRequirement;
  if (!requirement) {
    return null;
  }

  const registered = course.registeredStudentIds.length;
  const label = getCourseLabel(course);

  switch (requirement.type) {
    case "FULL_GRADE":
      return registered === gradePopulation
        ? null
        : `${label} requires the full grade (${gradePopulation}) but has ${registered} registered`;
    case "EXACT":
      return registered === requirement.count
        ? null
        : `${label} requires exactly ${requirement.count} students but has ${registered} registered`;
    case "MIN":
      return registered >= (requirement.count ?? 0)
        ? null
        : `${label} requires at least ${requirement.count} students but has ${registered} registered`;
    case "MAX":
      return requirement.count === undefined || registered <= requirement.count
        ? null
        : `${label} allows at most ${requirement.count} students but has ${registered} registered`;
  }
}
