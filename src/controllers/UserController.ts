import { Request, Response } from "express";
import { Member } from "../models/types";
import { RecordStore } from "../stores/RecordStore";
import { readField, requiredInt, requiredString } from "../utils/params";

export class UserController {
  constructor(private readonly members: RecordStore<Member>) {}

  listUsers = (req: Request, res: Response) => {
    res.json({ users: this.members.list() });
  };

  getUser = (req: Request, res: Response) => {
    const id = requiredInt(req.params.id, "user_id");
    res.json(this.members.getById(id));
  };

  createUser = (req: Request, res: Response) => {
    const name = requiredString(readField(req, "name"), "name");
    const email = requiredString(readField(req, "email"), "email");

    const user = this.members.create((id) => ({ id, name, email }));

    res.status(201).json({ message: "User created", user });
  };
}
