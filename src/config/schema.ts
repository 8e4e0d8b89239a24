// Configuration schema. Every field carries its default, so parsing `{}` yields
// the full configuration used on a fresh server with no config file.
// Add new settings here and in config/config.example.yaml.
import { z } from "zod";
import { STEP_NAMES } from "../types/step.js";
import { DISTRO_FAMILIES } from "../types/distro.js";

/** Login names end up in sudoers and shell command lines, so keep them to the portable set. */
export const USERNAME_PATTERN = /^[a-z_][a-z0-9_-]*$/;

const absolutePath = z.string().startsWith("/", { message: "must be an absolute path" });

export const DEFAULT_SSH_DIRECTIVES: Record<string, string> = {
  PasswordAuthentication: "no",
  PermitRootLogin: "no",
  PubkeyAuthentication: "yes",
};

export const configSchema = z.object({
  user: z.object({
    name: z.string().min(1).max(32).regex(USERNAME_PATTERN, "must be a lowercase POSIX login name").default("michau"),
    shell: absolutePath.default("/bin/bash"),
    home_root: absolutePath.default("/home"),
  }).default({}),
  sudo: z.object({
    sudoers_dir: absolutePath.default("/etc/sudoers.d"),
    validate: z.boolean().default(true),
  }).default({}),
  ssh: z.object({
    admin_authorized_keys: absolutePath.default("/root/.ssh/authorized_keys"),
    sshd_config: absolutePath.default("/etc/ssh/sshd_config"),
    sshd_binary: z.string().min(1).default("sshd"),
    service_name: z.string().min(1).default("sshd"),
    directives: z.record(z.string().regex(/^[A-Za-z]+$/, "must be an sshd keyword"), z.string().min(1))
      .default(DEFAULT_SSH_DIRECTIVES),
  }).default({}),
  runtime: z.object({
    nvm_version: z.string().regex(/^v\d+\.\d+\.\d+$/, "must look like v0.40.3").default("v0.40.3"),
    nvm_install_url: z.string().url().default("https://raw.githubusercontent.com/nvm-sh/nvm/{version}/install.sh"),
    /** "lts" tracks the latest long-term-support release; anything else pins that version. */
    node_version: z.string().min(1).default("lts"),
  }).default({}),
  cli: z.object({
    package: z.string().min(1).default("@anthropic-ai/claude-code"),
    version: z.string().min(1).nullable().default(null),
    binary: z.string().min(1).default("claude"),
  }).default({}),
  alias: z.object({
    name: z.string().regex(/^[A-Za-z_][A-Za-z0-9_-]*$/, "must be a valid alias name").default("claudeca"),
    command: z.string().min(1).default("claude --continue --dangerously-allow-everything"),
    comment: z.string().default("Claude Code alias"),
    profile: z.string().min(1).default(".bashrc"),
  }).default({}),
  errors: z.object({
    /** Seconds; replaces every per-category timeout when non-zero. 0 keeps the defaults. */
    command_timeout_override: z.number().int().nonnegative().default(0),
  }).default({}),
  output: z.object({
    stream_commands: z.boolean().default(true),
  }).default({}),
  skip_steps: z.array(z.enum(STEP_NAMES)).default([]),
  distro: z.object({
    family: z.enum(DISTRO_FAMILIES),
  }).partial().optional(),
});

export type BootstrapConfig = z.infer<typeof configSchema>;
