// Imported ahead of 'config', which reads this variable when it first loads.
// Hosts without a config/ directory run on the schema defaults.
process.env.SUPPRESS_NO_CONFIG_WARNING ??= 'true';
