process.env["DISABLE_LOG"] = "true";
process.env["STORAGE_DRIVER"] = "memory";
