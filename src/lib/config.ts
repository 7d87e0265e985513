// Tool binaries and defaults can be overridden from the environment.
const env = (k: string, d?: string) => (process.env[k] ?? d ?? "");

export const TOOLS = {
  parted: env("PIEMU_PARTED", "parted"),
  debugfs: env("PIEMU_DEBUGFS", "debugfs"),
  e2fsck: env("PIEMU_E2FSCK", "e2fsck"),
  resize2fs: env("PIEMU_RESIZE2FS", "resize2fs"),
  qemu: env("PIEMU_QEMU", "qemu-system-arm"),
} as const;

export const DEFAULT_KERNEL = env("PIEMU_KERNEL", "kernel-qemu");

/** Name of the extracted root partition kept in the working directory by --keep-root. */
export const KEPT_ROOT_NAME = "root.img";

// Paths inside the guest root filesystem.
export const GUEST = {
  udevRules: "/etc/udev/rules.d/90-qemu-sda.rules",
  preload: "/etc/ld.so.preload",
  sshDir: "/etc/ssh",
  hostKeyGlob: "ssh_host_*_key*",
  regenInitScript: "/etc/init.d/regenerate_ssh_host_keys",
  piSshDir: "/home/pi/.ssh",
  authorizedKeys: "/home/pi/.ssh/authorized_keys",
} as const;

export const PI_UID = 1000;
export const PI_GID = 1000;

export const KEYGEN_COMMAND = "ssh-keygen";

// QEMU exposes the image as sda; Raspbian expects mmcblk0 and its partitions.
export const UDEV_RULES =
  'KERNEL=="sda", SYMLINK+="mmcblk0"\n' +
  'KERNEL=="sda?", SYMLINK+="mmcblk0p%n"\n' +
  'KERNEL=="sda2", SYMLINK+="root"\n';
