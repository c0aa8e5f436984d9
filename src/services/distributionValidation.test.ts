import { DistributionValidator } from "./distributionValidation";
import { CourseStore } from "../stores/courseStore";
import { SectionStore } from "../stores/sectionStore";
import {
  addCourseWithSections,
  addPeriods,
  addStudents,
  createTestDatabase,
  silenceConsole,
  studentId,
} from "../testing/schoolFixtures";

describe("DistributionValidator", () => {
  silenceConsole();

  function setup() {
    const db = createTestDatabase();
    addStudents(db, 6, 3);
    const periods = addPeriods(db, 2);
    const math = addCourseWithSections(
      db,
      { name: "Math 6", code: "MATH6", gradeLevel: 6, duration: "YEAR" },
      [periods[0]]
    );
    const art = addCourseWithSections(
      db,
      { name: "Art 6", code: "ART6", gradeLevel: 6, courseType: "ELECTIVE", duration: "YEAR" },
      [periods[0]]
    );
    const french = addCourseWithSections(
      db,
      { name: "French 6", code: "FR6", gradeLevel: 6, courseType: "LANGUAGE" },
      [periods[1]],
      1
    );
    const spanish = addCourseWithSections(
      db,
      { name: "Spanish 6", code: "SP6", gradeLevel: 6, courseType: "LANGUAGE" },
      [periods[1]],
      2
    );
    return {
      db,
      periods,
      math,
      art,
      french,
      spanish,
      sectionStore: new SectionStore(db),
      validator: new DistributionValidator(db),
    };
  }

  describe("validateGradeLevel", () => {
    it("requires every core course to hold the whole grade", () => {
      const { math, sectionStore, validator } = setup();
      sectionStore.addStudent(math.sections[0].id, studentId(6, 1));
      sectionStore.addStudent(math.sections[0].id, studentId(6, 2));

      expect(validator.validateGradeLevel(6)).toEqual({
        valid: false,
        totalStudents: 3,
        errors: ["Required course Math 6 has 2 students enrolled, but grade 6 has 3 total students"],
      });
    });

    it("passes once the grade is fully enrolled", () => {
      const { math, sectionStore, validator } = setup();
      for (let i = 1; i <= 3; i++) {
        sectionStore.addStudent(math.sections[0].id, studentId(6, i));
      }

      expect(validator.validateGradeLevel(6)).toEqual({ valid: true, totalStudents: 3, errors: [] });
    });
  });

  describe("findPeriodConflicts", () => {
    it("reports two courses meeting in the same period", () => {
      const { periods, math, art, sectionStore, validator } = setup();
      sectionStore.addStudent(math.sections[0].id, studentId(6, 1));
      sectionStore.addStudent(art.sections[0].id, studentId(6, 1));

      const conflicts = validator.findPeriodConflicts();

      expect(conflicts).toHaveLength(1);
      expect(conflicts[0].studentId).toBe(studentId(6, 1));
      expect(conflicts[0].periodId).toBe(periods[0].id);
      expect([...conflicts[0].sectionIds].sort()).toEqual(
        [math.sections[0].id, art.sections[0].id].sort()
      );
    });

    it("accepts courses sharing a period in different trimesters", () => {
      const { french, spanish, sectionStore, validator } = setup();
      sectionStore.addStudent(french.sections[0].id, studentId(6, 1));
      sectionStore.addStudent(spanish.sections[0].id, studentId(6, 1));

      expect(validator.findPeriodConflicts()).toEqual([]);
    });
  });

  describe("checkStudentCountRequirements", () => {
    it("lists courses that miss their requirement", () => {
      const { db, art, validator } = setup();
      const courseStore = new CourseStore(db);
      courseStore.update(art.course.id, { studentCountRequirement: { type: "EXACT", count: 2 } });
      courseStore.registerStudents(art.course.id, [studentId(6, 1)]);

      expect(validator.checkStudentCountRequirements()).toEqual([
        "Art 6 (ART6) requires exactly 2 students but has 1 registered",
      ]);
    });
  });

  describe("validateAll", () => {
    it("checks the grades that have core courses", () => {
      const { validator } = setup();

      const validation = validator.validateAll();

      expect(Object.keys(validation.gradeLevels)).toEqual(["6"]);
      expect(validation.gradeLevels[6].valid).toBe(false);
      expect(validation.conflicts).toEqual([]);
      expect(validation.requirementWarnings).toEqual([]);
    });
  });
});
