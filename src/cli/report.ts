import {
  BatchDistributionSuccess,
  CourseDistributionStatus,
  CourseDistributionSuccess,
  LanguageGroupDistributionSuccess,
  SectionDistribution,
  UnassignedStudent,
} from "../domain/distribution";

/**
 * Terminal rendering of distribution results. Every function returns the
 * lines to print so callers (and tests) decide where they go.
 */

export function renderFillBar(value: number, max: number, width: number): string {
  const percentage = max > 0 ? Math.min(value / max, 1) : 0;
  const filled = Math.round(percentage * width);
  const empty = width - filled;

  return `[${"█".repeat(filled)}${"░".repeat(empty)}]`;
}

function sectionLine(section: SectionDistribution, largest: number): string {
  const period = section.periodName ?? "unscheduled";
  const term = section.trimester ? ` T${section.trimester}` : "";
  return `   ${section.sectionName.padEnd(16)} ${period}${term}  ${renderFillBar(section.studentCount, largest, 20)} ${section.studentCount}`;
}

function sectionLines(distribution: SectionDistribution[]): string[] {
  const largest = Math.max(1, ...distribution.map((s) => s.studentCount));
  return distribution.map((s) => sectionLine(s, largest));
}

function unassignedLines(unassigned: UnassignedStudent[]): string[] {
  if (unassigned.length === 0) {
    return [];
  }
  return [
    `\n⚠️  ${unassigned.length} unassigned:`,
    ...unassigned.map((s) => `   - ${`${s.firstName} ${s.lastName}`.trim() || s.id}: ${s.reason}`),
  ];
}

export function formatCourseResult(result: CourseDistributionSuccess | CourseDistributionStatus): string[] {
  const label = result.courseCode ? `${result.courseName} (${result.courseCode})` : result.courseName;
  const placed = result.distribution.reduce((sum, s) => sum + s.studentCount, 0);
  const lines = [
    "═".repeat(50),
    `  ${label}`,
    "═".repeat(50),
    `   Placed ${placed} of ${result.totalStudents} students in ${result.numSections} section(s)`,
    ...sectionLines(result.distribution),
  ];
  if ("unassigned" in result) {
    lines.push(...unassignedLines(result.unassigned));
  }
  return lines;
}

export function formatLanguageGroupResult(result: LanguageGroupDistributionSuccess): string[] {
  const placed = result.totalStudents - result.unassigned.length;
  return [
    "═".repeat(50),
    `  ${result.groupName} (Grade ${result.gradeLevel})`,
    "═".repeat(50),
    `   Rotated ${placed} of ${result.totalStudents} students`,
    ...sectionLines(result.distribution),
    ...unassignedLines(result.unassigned),
  ];
}

export function formatBatchResult(result: BatchDistributionSuccess): string[] {
  const lines: string[] = [];

  for (const [groupId, groupResult] of Object.entries(result.languageGroups)) {
    lines.push(
      ...(groupResult.success
        ? formatLanguageGroupResult(groupResult)
        : [`❌ Language group ${groupId}: ${groupResult.error}`])
    );
  }
  for (const [courseId, courseResult] of Object.entries(result.courses)) {
    lines.push(
      ...(courseResult.success
        ? formatCourseResult(courseResult)
        : [`❌ Course ${courseId}: ${courseResult.error}`])
    );
  }

  const { validation } = result;
  lines.push("\n📋 Validation:");
  for (const [gradeLevel, grade] of Object.entries(validation.gradeLevels)) {
    lines.push(
      grade.valid
        ? `   ✅ Grade ${gradeLevel}: ${grade.totalStudents} students`
        : `   ❌ Grade ${gradeLevel}: ${grade.errors.join("; ")}`
    );
  }
  lines.push(`   Period conflicts: ${validation.conflicts.length}`);
  for (const warning of validation.requirementWarnings) {
    lines.push(`   ⚠️  ${warning}`);
  }

  return lines;
}
