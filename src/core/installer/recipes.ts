import { ToolRecipe } from '../../types/Installer';
import { CommandSpec } from '../../types/Service';

const sh = (script: string): CommandSpec => ({ command: 'sh', args: ['-c', script] });
const onPath = (binary: string): CommandSpec => sh(`command -v ${binary}`);
const apt = (...packages: string[]): CommandSpec =>
  sh(`apt-get update -qq && apt-get install -y -qq ${packages.join(' ')}`);

/**
 * Recipes for the toolchains a fresh Debian/Ubuntu host usually lacks. A
 * manifest `tools` entry with the same name replaces the built-in one.
 */
export const BUILTIN_RECIPES: ToolRecipe[] = [
  {
    name: 'curl',
    check: onPath('curl'),
    install: [apt('curl')],
  },
  {
    name: 'git',
    check: onPath('git'),
    install: [apt('git')],
  },
  {
    name: 'node',
    description: 'Node.js 20.x',
    check: onPath('node'),
    install: [
      sh('curl -fsSL https://deb.nodesource.com/setup_20.x | bash - && apt-get install -y -qq nodejs'),
      apt('nodejs', 'npm'),
    ],
  },
  {
    name: 'npm',
    check: onPath('npm'),
    install: [apt('npm')],
  },
  {
    name: 'python3',
    check: onPath('python3'),
    install: [apt('python3', 'python3-dev')],
  },
  {
    name: 'pip3',
    check: onPath('pip3'),
    install: [apt('python3-pip'), sh('python3 -m ensurepip --upgrade')],
  },
  {
    name: 'docker',
    check: onPath('docker'),
    install: [
      sh('curl -fsSL https://get.docker.com -o /tmp/get-docker.sh && sh /tmp/get-docker.sh'),
      apt('docker.io'),
    ],
  },
  {
    name: 'docker-compose',
    check: onPath('docker-compose'),
    install: [
      sh(
        'curl -fsSL "https://github.com/docker/compose/releases/download/v2.24.0/docker-compose-$(uname -s)-$(uname -m)" -o /usr/local/bin/docker-compose && chmod +x /usr/local/bin/docker-compose'
      ),
      apt('docker-compose'),
    ],
  },
];
