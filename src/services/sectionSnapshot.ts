import { SectionDistribution } from "../domain/distribution";
import { Section } from "../domain/section";
import { isStudent, toStudentSummary } from "../domain/user";
import { SchoolDatabase } from "../stores/schoolDatabase";

/**
 * Per-section roster as reported by distribution results and status queries
 */
export function snapshotSections(db: SchoolDatabase, sections: Section[]): SectionDistribution[] {
  const { periods, users } = db.tables;

  return sections.map((section) => {
    const period = section.periodId ? periods.find((p) => p.id === section.periodId) : undefined;
    const students = section.studentIds
      .map((id) => users.find((u) => u.id === id))
      .filter((u): u is NonNullable<typeof u> => u !== undefined)
      .filter(isStudent)
      .map(toStudentSummary);

    return {
      sectionId: section.id,
      sectionName: section.name,
      periodId: section.periodId,
      periodName: period?.name ?? null,
      trimester: section.trimester,
      studentCount: section.studentIds.length,
      students,
    };
  });
}
