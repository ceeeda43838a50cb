#!/usr/bin/env node
import { exitWith, startCli } from './start.js';

// 引数なしで常に enroll（学生4名のデータセット）
exitWith(startCli([], { command: 'enroll', overrides: { seed: { dataset: 'compact' } } }));
