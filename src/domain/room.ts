/**
 * Room Domain Model
 *
 * Physical classrooms. A room's capacity caps the enrollment of any section
 * scheduled in it.
 */

export interface Room {
  id: string;
  name: string;
  capacity: number;
  description?: string;
  isScienceLab: boolean;
  isArtRoom: boolean;
  isGym: boolean;
  createdAt: string;
  updatedAt?: string;
}

export interface CreateRoomInput {
  name: string;
  capacity: number;
  description?: string;
  isScienceLab?: boolean;
  isArtRoom?: boolean;
  isGym?: boolean;
}

export interface UpdateRoomInput {
  name?: string;
  capacity?: number;
  description?: string;
  isScienceLab?: boolean;
  isArtRoom?: boolean;
  isGym?: boolean;
}

export function validateRoom(input: { name?: string; capacity?: number }): string[] {
  const errors: string[] = [];

  if (input.name !== undefined && input.name.trim().length === 0) {
    errors.push("name is required");
  }
  if (input.capacity !== undefined) {
    if (!Number.isInteger(input.capacity) || input.capacity < 1) {
      errors.push("capacity must be at least 1");
    }
  }

  return errors;
}
