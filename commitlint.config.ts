export default {
  extends: ["@commitlint/config-conventional"],
  rules: {
    // Allow these scopes matching project structure
    "scope-enum": [
      2,
      "always",
      [
        "agent",
        "shared",
        "catalog",
        "scheduler",
        "sinks",
        "config",
        "prepare-db",
        "deps",
        "ci",
      ],
    ],
    "scope-empty": [0], // scope is optional
  },
};
