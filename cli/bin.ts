#!/usr/bin/env tsx

import { run } from './index'
import { exitWithError } from './helpers'

run().catch(exitWithError)
