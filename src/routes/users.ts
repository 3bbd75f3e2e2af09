import { Router } from "express";
import { UserController } from "../controllers/UserController";
import { Member } from "../models/types";
import { RecordStore } from "../stores/RecordStore";

export function createUserRoutes(members: RecordStore<Member>) {
  const router = Router();
  const controller = new UserController(members);

  router.get("/", controller.listUsers);
  router.get("/:id", controller.getUser);
  router.post("/", controller.createUser);

  return router;
}
