import chalk from 'chalk';

// Plain output so log assertions do not depend on the terminal
chalk.level = 0;
