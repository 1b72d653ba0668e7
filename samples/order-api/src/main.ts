import { buildApp } from "./app";

await buildApp().run();
