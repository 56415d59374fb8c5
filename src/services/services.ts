import type { LogicService } from "./logic.service.js";
import type { StorageService } from "./storage.service.js";

export interface Services {
  logicService: LogicService;
  storageService: StorageService;
}
