import { AppOptions, createBaseApp } from "./base";
import { AccountController } from "../controllers/AccountController";
import { requireAdmin, requireCapability, requireUser } from "../middleware/auth";
import { AccountDirectory } from "../stores/AccountDirectory";

export interface AccountsAppOptions extends AppOptions {
  directory?: AccountDirectory;
}

// Token -> account -> role, each step a middleware that can end the request
export const createAccountsApp = (options: AccountsAppOptions = {}) => {
  const directory = options.directory ?? new AccountDirectory();
  const controller = new AccountController(directory);

  return createBaseApp(options, (app) => {
    app.get("/", controller.home);
    app.get("/profile", requireUser(directory), controller.profile);
    app.get("/admin", requireAdmin(directory), controller.adminPanel);
    app.delete(
      "/users/:username",
      requireCapability(directory, "admin:delete-user"),
      controller.deleteUser,
    );
  });
};
