import { Request, Response } from "express";
import { currentAccount } from "../middleware/auth";
import { AccountDirectory } from "../stores/AccountDirectory";

export class AccountController {
  constructor(private readonly directory: AccountDirectory) {}

  home = (req: Request, res: Response) => {
    res.json({ message: "Welcome! This page is open to everyone." });
  };

  profile = (req: Request, res: Response) => {
    const account = currentAccount(res);
    res.json({
      message: `Welcome, ${account.username}!`,
      profile: {
        username: account.username,
        email: account.email,
        role: account.role,
      },
    });
  };

  adminPanel = (req: Request, res: Response) => {
    const admin = currentAccount(res);
    res.json({
      message: `Welcome, administrator ${admin.username}!`,
      admin_panel: "Full access granted",
    });
  };

  deleteUser = (req: Request, res: Response) => {
    const admin = currentAccount(res);
    const { username } = req.params;

    this.directory.removeByUsername(username);

    res.json({ message: `Administrator ${admin.username} deleted ${username}` });
  };
}
