import { randomUUID } from "crypto";
import { CreateRoomInput, Room, UpdateRoomInput, validateRoom } from "../domain/room";
import { SchoolDatabase, definedFields, getSchoolDatabase } from "./schoolDatabase";
import { SectionStore } from "./sectionStore";
import { ValidationError } from "../domain/validationError";

/**
 * RoomStore handles persistence for classrooms.
 *
 * Rooms are referenced weakly by sections: deleting a room leaves its
 * sections unscheduled rather than deleting them.
 */
export class RoomStore {
  private sectionStore: SectionStore;

  constructor(private readonly db: SchoolDatabase = getSchoolDatabase()) {
    this.sectionStore = new SectionStore(db);
  }

  create(input: CreateRoomInput): Room {
    const errors = this.validate(input);
    if (errors.length > 0) {
      throw new ValidationError("room", errors);
    }

    const room: Room = {
      id: randomUUID(),
      name: input.name.trim(),
      capacity: input.capacity,
      description: input.description,
      isScienceLab: input.isScienceLab ?? false,
      isArtRoom: input.isArtRoom ?? false,
      isGym: input.isGym ?? false,
      createdAt: new Date().toISOString(),
    };

    this.db.tables.rooms.push(room);
    this.db.save();
    return room;
  }

  validate(input: { name?: string; capacity?: number }, roomId?: string): string[] {
    const errors = validateRoom(input);
    const name = input.name?.trim();
    if (name && this.db.tables.rooms.some((r) => r.id !== roomId && r.name === name)) {
      errors.push(`A room named ${name} already exists`);
    }
    return errors;
  }

  load(roomId: string): Room | null {
    return this.db.tables.rooms.find((r) => r.id === roomId) || null;
  }

  getAll(): Room[] {
    return [...this.db.tables.rooms].sort((a, b) => a.name.localeCompare(b.name));
  }

  /**
   * Rooms not used by any section in the period, with at least `minCapacity` seats
   */
  getAvailable(periodId: string, minCapacity: number = 1): Room[] {
    const usedRoomIds = new Set(
      this.sectionStore.getByPeriod(periodId).map((s) => s.roomId)
    );
    return this.getAll().filter((r) => r.capacity >= minCapacity && !usedRoomIds.has(r.id));
  }

  update(roomId: string, input: UpdateRoomInput): Room | null {
    const existing = this.load(roomId);
    if (!existing) {
      return null;
    }

    const changes = definedFields(input);
    const errors = this.validate(changes, roomId);
    if (errors.length > 0) {
      throw new ValidationError("room", errors);
    }

    Object.assign(existing, changes, { updatedAt: new Date().toISOString() });
    this.db.save();
    return existing;
  }

  delete(roomId: string): boolean {
    const tables = this.db.tables;
    const initialLength = tables.rooms.length;
    tables.rooms = tables.rooms.filter((r) => r.id !== roomId);
    if (tables.rooms.length === initialLength) {
      return false;
    }

    this.sectionStore.detachReference("roomId", roomId);
    this.db.save();
    return true;
  }
}
