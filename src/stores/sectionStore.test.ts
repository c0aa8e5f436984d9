import { SectionStore } from "./sectionStore";
import { CourseStore } from "./courseStore";
import { RoomStore } from "./roomStore";
import { ValidationError } from "../domain/validationError";
import { addPeriods, addStudents, createTestDatabase } from "../testing/schoolFixtures";

function captureError(work: () => unknown): unknown {
  try {
    work();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe("SectionStore", () => {
  function setup() {
    const db = createTestDatabase();
    const periods = addPeriods(db, 2);
    const courseStore = new CourseStore(db);
    const pe = courseStore.create({
      name: "Physical Education 6",
      code: "PE6",
      gradeLevel: 6,
      duration: "YEAR",
      numSections: 2,
    });
    return { db, periods, pe, courseStore, sectionStore: new SectionStore(db) };
  }

  describe("create", () => {
    it("numbers and names sections after the course", () => {
      const { periods, pe, sectionStore } = setup();

      const first = sectionStore.create({ courseId: pe.id, periodId: periods[0].id });
      const second = sectionStore.create({ courseId: pe.id, periodId: periods[1].id });

      expect([first.sectionNumber, first.name]).toEqual([1, "PE6-1"]);
      expect([second.sectionNumber, second.name]).toEqual([2, "PE6-2"]);
      expect(first.trimester).toBeNull();
      expect(first.studentIds).toEqual([]);
    });

    it("requires a trimester for trimester courses", () => {
      const { courseStore, sectionStore } = setup();
      const french = courseStore.create({ name: "French 7", gradeLevel: 7, courseType: "LANGUAGE" });

      const error = captureError(() => sectionStore.create({ courseId: french.id }));

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({
        entity: "section",
        details: ["Trimester courses must have a trimester assigned"],
      });
    });

    it("rejects a room that is already used in the period", () => {
      const { db, periods, pe, sectionStore } = setup();
      const gym = new RoomStore(db).create({ name: "Gym", capacity: 60, isGym: true });
      sectionStore.create({ courseId: pe.id, periodId: periods[0].id, roomId: gym.id });

      const error = captureError(() =>
        sectionStore.create({ courseId: pe.id, periodId: periods[0].id, roomId: gym.id })
      );

      expect(error).toMatchObject({ details: ["Room Gym is already scheduled for this period"] });
    });

    it("only accepts teachers as section teachers", () => {
      const { db, periods, pe, sectionStore } = setup();
      const [student] = addStudents(db, 6, 1);

      const error = captureError(() =>
        sectionStore.create({ courseId: pe.id, periodId: periods[0].id, teacherId: student.id })
      );

      expect(error).toMatchObject({ details: [`Teacher ${student.id} not found`] });
    });

    it("rejects sections for unknown courses", () => {
      const { sectionStore } = setup();

      const error = captureError(() => sectionStore.create({ courseId: "missing" }));

      expect(error).toMatchObject({ details: ["Course missing not found"] });
    });
  });

  describe("update", () => {
    it("leaves fields that are not supplied untouched", () => {
      const { periods, pe, sectionStore } = setup();
      const section = sectionStore.create({ courseId: pe.id, periodId: periods[0].id });

      const updated = sectionStore.update(section.id, { name: undefined, maxStudents: 20 });

      expect(updated?.name).toBe("PE6-1");
      expect(updated?.maxStudents).toBe(20);
      expect(updated?.periodId).toBe(periods[0].id);
    });

    it("returns null for an unknown section", () => {
      const { sectionStore } = setup();

      expect(sectionStore.update("missing", { maxStudents: 10 })).toBeNull();
    });

    it("rejects a capacity below the current enrollment", () => {
      const { db, periods, pe, sectionStore } = setup();
      const section = sectionStore.create({ courseId: pe.id, periodId: periods[0].id });
      sectionStore.addStudent(section.id, "s1");
      sectionStore.addStudent(section.id, "s2");

      const error = captureError(() => sectionStore.update(section.id, { maxStudents: 1 }));

      expect(error).toMatchObject({
        entity: "section",
        details: ["Capacity 1 is below the 2 students already enrolled"],
      });
      expect(new SectionStore(db).load(section.id)?.maxStudents).toBeUndefined();
    });
  });

  describe("getCapacity", () => {
    it("is limited by the section override and the room", () => {
      const { db, periods, pe, sectionStore } = setup();
      const room = new RoomStore(db).create({ name: "B12", capacity: 20 });
      const section = sectionStore.create({
        courseId: pe.id,
        periodId: periods[0].id,
        maxStudents: 25,
        roomId: room.id,
      });

      expect(sectionStore.getCapacity(section)).toBe(20);
    });
  });

  describe("enrollment", () => {
    it("adds each student once", () => {
      const { periods, pe, sectionStore } = setup();
      const section = sectionStore.create({ courseId: pe.id, periodId: periods[0].id });

      sectionStore.addStudent(section.id, "s1");
      sectionStore.addStudent(section.id, "s1");

      expect(sectionStore.load(section.id)?.studentIds).toEqual(["s1"]);
      expect(sectionStore.getByStudent("s1").map((s) => s.id)).toEqual([section.id]);
    });

    it("enrolls a student by hand while the section has room", () => {
      const { db, periods, pe, sectionStore } = setup();
      addStudents(db, 6, 2);
      const section = sectionStore.create({ courseId: pe.id, periodId: periods[0].id, maxStudents: 1 });

      sectionStore.enrollStudent(section.id, "student-6-1");
      const error = captureError(() => sectionStore.enrollStudent(section.id, "student-6-2"));

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ entity: "enrollment", details: ["Section PE6-1 is full (1 students)"] });
      expect(sectionStore.load(section.id)?.studentIds).toEqual(["student-6-1"]);
    });

    it("rejects hand enrollment of an unknown student", () => {
      const { periods, pe, sectionStore } = setup();
      const section = sectionStore.create({ courseId: pe.id, periodId: periods[0].id });

      const error = captureError(() => sectionStore.enrollStudent(section.id, "nobody"));

      expect(error).toMatchObject({ details: ["Student nobody not found"] });
      expect(sectionStore.enrollStudent("missing", "nobody")).toBeNull();
    });

    it("clears every section of a course and reports how many", () => {
      const { periods, pe, sectionStore } = setup();
      const first = sectionStore.create({ courseId: pe.id, periodId: periods[0].id });
      const second = sectionStore.create({ courseId: pe.id, periodId: periods[1].id });
      sectionStore.addStudent(first.id, "s1");
      sectionStore.addStudent(second.id, "s2");

      expect(sectionStore.clearCourseEnrollments(pe.id)).toBe(2);
      expect(sectionStore.getByCourse(pe.id).map((s) => s.studentIds)).toEqual([[], []]);
    });
  });

  describe("detachReference", () => {
    it("unschedules sections when their period goes away", () => {
      const { periods, pe, sectionStore } = setup();
      const section = sectionStore.create({ courseId: pe.id, periodId: periods[0].id });

      expect(sectionStore.detachReference("periodId", periods[0].id)).toBe(1);
      expect(sectionStore.load(section.id)?.periodId).toBeNull();
    });
  });
});
