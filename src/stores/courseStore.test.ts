import { CourseStore } from "./courseStore";
import { GroupStore } from "./groupStore";
import { SectionStore } from "./sectionStore";
import { ValidationError } from "../domain/validationError";
import {
  addCourseWithSections,
  addPeriods,
  addStudents,
  createTestDatabase,
  studentId,
} from "../testing/schoolFixtures";

function captureError(work: () => unknown): unknown {
  try {
    work();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe("CourseStore", () => {
  describe("create", () => {
    it("fills in defaults", () => {
      const store = new CourseStore(createTestDatabase());

      const course = store.create({ name: " Math 6 ", gradeLevel: 6 });

      expect(course).toMatchObject({
        name: "Math 6",
        courseType: "CORE",
        duration: "TRIMESTER",
        numSections: 1,
        maxStudentsPerSection: 30,
        registeredStudentIds: [],
      });
    });

    it("rejects a code already used by another course, ignoring case", () => {
      const store = new CourseStore(createTestDatabase());
      store.create({ name: "Physical Education 6", code: "PE6", gradeLevel: 6 });

      const error = captureError(() => store.create({ name: "Other", code: "pe6", gradeLevel: 6 }));

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ details: ["code pe6 is already used by Physical Education 6"] });
    });

    it("checks the students of an initial roster", () => {
      const db = createTestDatabase();
      addStudents(db, 6, 1);
      const store = new CourseStore(db);
      store.create({
        name: "Band 6",
        code: "BAND6",
        gradeLevel: 6,
        exclusivityGroup: "music",
        registeredStudentIds: [studentId(6, 1)],
      });

      const error = captureError(() =>
        store.create({
          name: "Orchestra 6",
          gradeLevel: 6,
          exclusivityGroup: "music",
          registeredStudentIds: [studentId(6, 1), "nobody"],
        })
      );

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({
        entity: "registration",
        details: ["Student1 Grade6 is already registered for Band 6 (BAND6)", "Student nobody not found"],
      });
      expect(store.getAll().map((c) => c.name)).toEqual(["Band 6"]);
    });
  });

  describe("update", () => {
    it("keeps a language group's courses language courses of its grade", () => {
      const db = createTestDatabase();
      const store = new CourseStore(db);
      const french = store.create({ name: "French 6", gradeLevel: 6, courseType: "LANGUAGE" });
      new GroupStore(db).createLanguageGroup({ gradeLevel: 6, courseIds: [french.id] });

      const error = captureError(() => store.update(french.id, { courseType: "ELECTIVE", gradeLevel: 7 }));

      expect(error).toMatchObject({
        entity: "course",
        details: [
          "French 6 is not a language course (Grade 6 Languages)",
          "French 6 is for grade 7, not grade 6 (Grade 6 Languages)",
        ],
      });
      expect(store.load(french.id)).toMatchObject({ courseType: "LANGUAGE", gradeLevel: 6 });
    });

    it("refuses to make a course trimester-long while its sections have no trimester", () => {
      const db = createTestDatabase();
      const periods = addPeriods(db, 1);
      const { course } = addCourseWithSections(
        db,
        { name: "Art 6", gradeLevel: 6, duration: "YEAR" },
        periods
      );

      const error = captureError(() => new CourseStore(db).update(course.id, { duration: "TRIMESTER" }));

      expect(error).toMatchObject({
        details: ["Trimester courses must have a trimester assigned: Art 6-1"],
      });
    });
  });

  describe("registration", () => {
    it("ignores students who are already registered", () => {
      const db = createTestDatabase();
      addStudents(db, 6, 2);
      const store = new CourseStore(db);
      const course = store.create({ name: "Art 6", gradeLevel: 6, duration: "YEAR" });

      store.registerStudents(course.id, [studentId(6, 1)]);
      const updated = store.registerStudents(course.id, [studentId(6, 1), studentId(6, 2)]);

      expect(updated?.registeredStudentIds).toEqual([studentId(6, 1), studentId(6, 2)]);
    });

    it("rejects unknown students", () => {
      const db = createTestDatabase();
      const store = new CourseStore(db);
      const course = store.create({ name: "Art 6", gradeLevel: 6 });

      const error = captureError(() => store.registerStudents(course.id, ["nobody"]));

      expect(error).toMatchObject({ entity: "registration", details: ["Student nobody not found"] });
    });

    it("blocks registration in two courses sharing an exclusivity label", () => {
      const db = createTestDatabase();
      addStudents(db, 6, 1);
      const store = new CourseStore(db);
      const band = store.create({ name: "Band 6", code: "BAND6", gradeLevel: 6, exclusivityGroup: "music" });
      const orchestra = store.create({ name: "Orchestra 6", gradeLevel: 6, exclusivityGroup: "music" });
      store.registerStudents(band.id, [studentId(6, 1)]);

      const error = captureError(() => store.registerStudents(orchestra.id, [studentId(6, 1)]));

      expect(error).toMatchObject({
        details: ["Student1 Grade6 is already registered for Band 6 (BAND6)"],
      });
    });

    it("treats members of a course group as exclusive peers", () => {
      const db = createTestDatabase();
      const store = new CourseStore(db);
      const drama = store.create({ name: "Drama 6", gradeLevel: 6 });
      const dance = store.create({ name: "Dance 6", gradeLevel: 6 });
      new GroupStore(db).createCourseGroup({ name: "Performing arts", courseIds: [drama.id, dance.id] });

      expect(store.getExclusivePeers(drama.id).map((c) => c.id)).toEqual([dance.id]);
    });

    it("removes an unregistered student from the course's sections", () => {
      const db = createTestDatabase();
      addStudents(db, 6, 1);
      const periods = addPeriods(db, 1);
      const { course, sections } = addCourseWithSections(
        db,
        { name: "Art 6", gradeLevel: 6, duration: "YEAR", registeredStudentIds: [studentId(6, 1)] },
        periods
      );
      const sectionStore = new SectionStore(db);
      sectionStore.addStudent(sections[0].id, studentId(6, 1));

      new CourseStore(db).unregisterStudent(course.id, studentId(6, 1));

      expect(new CourseStore(db).load(course.id)?.registeredStudentIds).toEqual([]);
      expect(sectionStore.load(sections[0].id)?.studentIds).toEqual([]);
    });
  });

  describe("delete", () => {
    it("removes the course's sections and group memberships", () => {
      const db = createTestDatabase();
      const periods = addPeriods(db, 2);
      const { course } = addCourseWithSections(
        db,
        { name: "Art 6", gradeLevel: 6, duration: "YEAR" },
        periods
      );
      const groupStore = new GroupStore(db);
      const group = groupStore.createCourseGroup({ name: "Arts", courseIds: [course.id] });

      expect(new CourseStore(db).delete(course.id)).toBe(true);
      expect(new SectionStore(db).getByCourse(course.id)).toEqual([]);
      expect(groupStore.loadCourseGroup(group.id)?.courseIds).toEqual([]);
    });

    it("returns false for an unknown course", () => {
      expect(new CourseStore(createTestDatabase()).delete("missing")).toBe(false);
    });
  });
});
