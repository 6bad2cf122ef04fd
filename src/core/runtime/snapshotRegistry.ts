import type { ClassifierSnapshot } from '../models/classifier'
import type { GridSnapshot } from '../models/grid'

export interface ActiveSnapshots {
  readonly grid: GridSnapshot
  readonly classifier: ClassifierSnapshot | null
}

/**
 * Holds the active (grid, classifier) pair. Publishing replaces the whole pair
 * in a single assignment; readers call `read()` once per request and keep
 * using that pair until they finish.
 */
export class SnapshotRegistry {
  private active: ActiveSnapshots
  private readonly classifierHistory = new Map<number, ClassifierSnapshot>()

  constructor(initial: ActiveSnapshots) {
    this.active = Object.freeze({ ...initial })
    if (initial.classifier) this.classifierHistory.set(initial.classifier.version, initial.classifier)
  }

  read(): ActiveSnapshots {
    return this.active
  }

  publishGrid(grid: GridSnapshot): ActiveSnapshots {
    this.active = Object.freeze({ grid, classifier: this.active.classifier })
    return this.active
  }

  publishClassifier(classifier: ClassifierSnapshot): ActiveSnapshots {
    this.classifierHistory.set(classifier.version, classifier)
    this.active = Object.freeze({ grid: this.active.grid, classifier })
    return this.active
  }

  classifierVersions(): number[] {
    return [...this.classifierHistory.keys()].sort((a, b) => a - b)
  }

  getClassifier(version: number): ClassifierSnapshot | undefined {
    return this.classifierHistory.get(version)
  }
}
