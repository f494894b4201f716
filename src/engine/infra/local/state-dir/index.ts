import * as path from 'node:path';
import type { StateDirPort } from '../../../ports/state-dir.port.js';
import type { Namespace, SnapshotId } from '../../../domain/ids.js';
import { namespaceSlug } from '../../../domain/ids.js';
import type { TreeDomain } from '../../../domain/snapshot-kind.js';

export class LocalStateDir implements StateDirPort {
  private readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  namespaceDir(ns: Namespace): string {
    return path.join(this.root, namespaceSlug(ns));
  }

  lockPath(ns: Namespace): string {
    return path.join(this.namespaceDir(ns), 'lock');
  }

  tokensDir(ns: Namespace): string {
    return path.join(this.namespaceDir(ns), 'tokens');
  }

  tokenPath(ns: Namespace, domain: TreeDomain): string {
    return path.join(this.tokensDir(ns), `${domain}.json`);
  }

  stagingDir(ns: Namespace, id: SnapshotId): string {
    return path.join(this.namespaceDir(ns), 'staging', id);
  }

  workDir(ns: Namespace): string {
    return path.join(this.namespaceDir(ns), 'work');
  }
}
