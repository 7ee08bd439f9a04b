#!/usr/bin/env node
import React from "react";
import { render } from "ink";
import { App } from "./app/app.js";

const instance = render(<App />);

instance.waitUntilExit().then(
  () => process.exit(0),
  (err: unknown) => {
    console.error(err);
    process.exit(1);
  },
);
