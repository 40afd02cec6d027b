import { config } from "dotenv";
import { defaultDeviceTablePath } from "./config";

config();

export const DEVICE_TABLE_PATH = process.env.APB_CONFIG || defaultDeviceTablePath();
export const DEBUG_MODE = process.env.APB_DEBUG === "true";
