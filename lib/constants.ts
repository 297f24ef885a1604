// depth of the buffer queue whose slots the remote composer mirrors
const NUM_BUFFER_SLOTS = 64;

export {
  NUM_BUFFER_SLOTS
};
