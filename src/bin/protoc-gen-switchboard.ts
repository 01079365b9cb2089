#!/usr/bin/env node

import { runNodeJs } from '@bufbuild/protoplugin';
import { protocGenSwitchboard } from '../protoc-gen-switchboard-plugin';

runNodeJs(protocGenSwitchboard);
