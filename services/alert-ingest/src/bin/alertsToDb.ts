import { createAlertsToDbProgram } from '../cli/alertsToDb';
import { runProgram } from '../cli/run';

void runProgram(createAlertsToDbProgram());
