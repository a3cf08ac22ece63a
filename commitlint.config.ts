export default {
  extends: ["@commitlint/config-conventional"],
  rules: {
    // Allow these scopes matching project structure
    "scope-enum": [
      2,
      "always",
      ["exporter", "shared", "probe", "targets", "metrics", "config", "deps", "ci"],
    ],
    "scope-empty": [0], // scope is optional
  },
};
