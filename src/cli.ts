#!/usr/bin/env node
import { exec } from "./cli/exec.js";

exec();
