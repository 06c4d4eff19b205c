import { createLinkSignificanceProgram } from '../cli/linkSignificance';
import { runProgram } from '../cli/run';

void runProgram(createLinkSignificanceProgram());
