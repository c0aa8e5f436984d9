/**
 * Rooms API Routes
 */

import { Router } from "express";
import { UpdateRoomInput } from "../../domain/room";
import { RoomStore } from "../../stores/roomStore";
import { SchoolDatabase } from "../../stores/schoolDatabase";
import { optionalBoolean, optionalNumber, optionalString, sendStoreError } from "./routeHelpers";

function parseRoomBody(body: Record<string, unknown>): UpdateRoomInput {
  return {
    name: optionalString(body.name),
    capacity: optionalNumber(body.capacity),
    description: optionalString(body.description),
    isScienceLab: optionalBoolean(body.isScienceLab),
    isArtRoom: optionalBoolean(body.isArtRoom),
    isGym: optionalBoolean(body.isGym),
  };
}

export function createRoomsRouter(db: SchoolDatabase): Router {
  const router = Router();
  const roomStore = new RoomStore(db);

  /**
   * GET /api/rooms
   * With ?periodId= (and optional ?minCapacity=) only rooms free in that period
   */
  router.get("/", (req, res) => {
    try {
      const periodId = optionalString(req.query.periodId);
      if (periodId) {
        return res.json(roomStore.getAvailable(periodId, optionalNumber(req.query.minCapacity)));
      }
      res.json(roomStore.getAll());
    } catch (error) {
      console.error("Error fetching rooms:", error);
      res.status(500).json({ error: "Failed to fetch rooms" });
    }
  });

  router.get("/:id", (req, res) => {
    try {
      const room = roomStore.load(req.params.id);
      if (!room) {
        return res.status(404).json({ error: "Room not found" });
      }
      res.json(room);
    } catch (error) {
      console.error("Error fetching room:", error);
      res.status(500).json({ error: "Failed to fetch room" });
    }
  });

  router.post("/", (req, res) => {
    try {
      const fields = parseRoomBody(req.body ?? {});
      if (!fields.name || fields.capacity === undefined) {
        return res.status(400).json({ error: "name and capacity are required" });
      }

      res.status(201).json(roomStore.create({ ...fields, name: fields.name, capacity: fields.capacity }));
    } catch (error) {
      sendStoreError(res, error, "create room");
    }
  });

  router.put("/:id", (req, res) => {
    try {
      const updated = roomStore.update(req.params.id, parseRoomBody(req.body ?? {}));
      if (!updated) {
        return res.status(404).json({ error: "Room not found" });
      }
      res.json(updated);
    } catch (error) {
      sendStoreError(res, error, "update room");
    }
  });

  router.delete("/:id", (req, res) => {
    try {
      if (!roomStore.delete(req.params.id)) {
        return res.status(404).json({ error: "Room not found" });
      }
      res.json({ success: true });
    } catch (error) {
      console.error("Error deleting room:", error);
      res.status(500).json({ error: "Failed to delete room" });
    }
  });

  return router;
}
