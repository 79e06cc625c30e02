import { startServer } from "./index";

startServer();
