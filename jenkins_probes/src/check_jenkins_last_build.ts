#!/usr/bin/env node
import { main } from './cli/program'
import { freshnessProbe } from './probes/definitions'

main(freshnessProbe)
