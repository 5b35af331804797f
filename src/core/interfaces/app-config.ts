import { Context } from "effect";
import type { AppConfig } from "../types/config";

export const AppConfigTag = Context.GenericTag<AppConfig>("AppConfig");
