/**
 * Built-in merge rule sets
 */

import type { MergeConfig } from "../core/types.js";

export const EMPTY_MERGE_CONFIG: MergeConfig = {
  mergeRequirements: [],
  preserveKeys: [],
  preserveSections: [],
};

/**
 * Packaging metadata (setup.cfg): requirement lists are unioned, project
 * specific sections and keys stay as the project wrote them
 */
export const SETUP_CFG_MERGE_CONFIG: MergeConfig = {
  mergeRequirements: [
    { sections: /^options$/, keys: /^install_requires$/ },
    { sections: /^options\.extras_require$/, keys: /^/ },
  ],
  preserveKeys: [
    { sections: /^tool:pytest$/, keys: /^testpaths$/ },
    { sections: /^build$/, keys: /^executable$/ },
  ],
  preserveSections: [
    { sections: /^freebsd$/ },
    { sections: /^infra\./ },
    { sections: /^mypy-/ },
    { sections: /^options\.data_files$/ },
    { sections: /^options\.entry_points$/ },
  ],
};

export const PYLINTRC_MERGE_CONFIG: MergeConfig = {
  mergeRequirements: [],
  preserveKeys: [
    { sections: /^MASTER$/, keys: /^extension-pkg-whitelist$/ },
    { sections: /^TYPECHECK$/, keys: /^ignored-modules$/ },
    { sections: /^TYPECHECK$/, keys: /^ignored-classes$/ },
  ],
  preserveSections: [],
};
