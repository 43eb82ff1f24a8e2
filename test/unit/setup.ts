import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { vi } from 'vitest';

process.env.NODE_ENV = 'test';

// Use cases log through Nest's static Logger; keep test output clean
Logger.overrideLogger(false);

// Worker threads need a little longer on slow machines
vi.setConfig({ testTimeout: 15000 });
