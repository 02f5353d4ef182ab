#!/usr/bin/env node
import { main } from './cli/program'
import { aggregateProbe } from './probes/definitions'

main(aggregateProbe)
